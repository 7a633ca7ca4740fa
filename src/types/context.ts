// src/types/context.ts
//docstring
// Responsibility: per-render-pass settings handed to every renderer.
// Boundary: no renderer reads these yet; they are reserved for display-aware formatting.
export type RenderContext = {
  readonly color?: boolean
  readonly width?: number
}
