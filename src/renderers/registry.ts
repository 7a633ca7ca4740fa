// src/renderers/registry.ts
//docstring
// Responsibility: the fixed set of renderers and the field-name → renderer lookup a driver uses.
// Boundary: selection only; rendering rules live in the *_renderer.ts modules.
import type { RenderContext } from '@/types/context'
import { assertNever } from '@/utils/assert'
import { renderDefault } from './default_renderer'
import { renderError } from './error_renderer'
import { renderException } from './exception_renderer'
import { renderExtra } from './extra_renderer'
import { toFieldValue } from './field_value'
import { renderLevel } from './level_renderer'
import { renderTrace } from './trace_renderer'
import { RENDERER_KINDS, type FieldRenderer, type RendererKind } from './types'

export type FieldRendererMap = Readonly<Record<string, RendererKind>>

export const renderers: Readonly<Record<RendererKind, FieldRenderer>> = Object.freeze({
  default: renderDefault,
  error: renderError,
  trace: renderTrace,
  exception: renderException,
  extra: renderExtra,
  level: renderLevel,
})

// Conventional field names; keys are lower case.
export const DEFAULT_FIELD_RENDERERS: FieldRendererMap = Object.freeze({
  level: 'level',
  severity: 'level',
  error: 'error',
  err: 'error',
  exception: 'exception',
  extra: 'extra',
  trace: 'trace',
  stacktrace: 'trace',
})

export const isRendererKind = (value: string): value is RendererKind => {
  return RENDERER_KINDS.some((kind) => kind === value)
}

export const getRenderer = (kind: RendererKind): FieldRenderer => {
  switch (kind) {
    case 'default':
      return renderers.default
    case 'error':
      return renderers.error
    case 'trace':
      return renderers.trace
    case 'exception':
      return renderers.exception
    case 'extra':
      return renderers.extra
    case 'level':
      return renderers.level
    default:
      return assertNever(kind, 'Unknown renderer kind')
  }
}

const findKind = (table: FieldRendererMap, fieldName: string): RendererKind | undefined => {
  const target = fieldName.toLowerCase()
  for (const [name, kind] of Object.entries(table)) {
    if (name.toLowerCase() === target) return kind
  }
  return undefined
}

export const resolveRenderer = (fieldName: string, overrides: FieldRendererMap = {}): RendererKind => {
  return findKind(overrides, fieldName) ?? findKind(DEFAULT_FIELD_RENDERERS, fieldName) ?? 'default'
}

/**
 * Render one extracted field by name. `input` may be a FieldValue, a string (text),
 * a byte buffer (raw JSON) or any decoded value.
 */
export const renderField = (
  ctx: RenderContext,
  fieldName: string,
  input: unknown,
  overrides?: FieldRendererMap,
): string => {
  const render = getRenderer(resolveRenderer(fieldName, overrides))
  return render(ctx, toFieldValue(input))
}
