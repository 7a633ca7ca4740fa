// src/renderers/field_value.ts
//docstring
// Responsibility: build and classify FieldValue inputs and render contexts.
// Boundary: pure; no decoding happens here.
import type { DecodedField, FieldValue, RawField, TextField } from '@/types/field'
import type { RenderContext } from '@/types/context'

const utf8 = new TextEncoder()

export const textField = (text: string): TextField => ({ kind: 'text', text })

export const rawField = (input: Uint8Array | string): RawField => ({
  kind: 'raw',
  bytes: typeof input === 'string' ? utf8.encode(input) : input,
})

export const decodedField = (value: unknown): DecodedField => ({ kind: 'decoded', value })

export const isFieldValue = (value: unknown): value is FieldValue => {
  if (typeof value !== 'object' || value === null) return false
  if (!('kind' in value)) return false
  switch (value.kind) {
    case 'text':
      return 'text' in value && typeof value.text === 'string'
    case 'raw':
      return 'bytes' in value && value.bytes instanceof Uint8Array
    case 'decoded':
      return 'value' in value
    default:
      return false
  }
}

/**
 * Classify whatever the driver extracted: strings are text, byte buffers are raw JSON,
 * an existing FieldValue passes through and everything else counts as decoded.
 */
export const toFieldValue = (input: unknown): FieldValue => {
  if (typeof input === 'string') return textField(input)
  if (input instanceof Uint8Array) return rawField(input)
  if (isFieldValue(input)) return input
  return decodedField(input)
}

export const createRenderContext = (settings: RenderContext = {}): RenderContext => Object.freeze({ ...settings })
