// src/renderers/types.ts
import type { RenderContext } from '@/types/context'
import type { FieldValue } from '@/types/field'

/** Turns one field value into display text. Total: returns a string for any input. */
export type FieldRenderer = (ctx: RenderContext, value: FieldValue) => string

export const RENDERER_KINDS = ['default', 'error', 'trace', 'exception', 'extra', 'level'] as const

export type RendererKind = (typeof RENDERER_KINDS)[number]
