// src/renderers/default_renderer.ts
//docstring
// Responsibility: generic fallback rendering for any field.
// Boundary: text passes through; raw JSON is decoded and described, or shown verbatim when it does not parse.
import { describeValue } from '@/utils/format'
import { decodeJson, decodeRaw, hasNonFinite } from './decode'
import type { FieldRenderer } from './types'

export const renderDefault: FieldRenderer = (_ctx, value) => {
  switch (value.kind) {
    case 'text':
      return value.text
    case 'raw': {
      const decoded = decodeJson(value.bytes)
      if (!decoded.ok || hasNonFinite(decoded.value)) return decodeRaw(value.bytes)
      return describeValue(decoded.value)
    }
    case 'decoded':
      return describeValue(value.value)
  }
}
