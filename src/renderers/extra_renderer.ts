// src/renderers/extra_renderer.ts
import { decodeAs, decodeOr, decodeRaw, scanTopLevelLiterals } from './decode'
import { matchesField, readExtraRecord, readString } from './records'
import type { FieldRenderer } from './types'

const INTEGER_LITERAL = /^-?\d+$/

// JSON.parse reads 42.0 and 4.2e1 as 42; only a plain integer literal counts as a line.
const hasIntegerLine = (bytes: Uint8Array): boolean => {
  return scanTopLevelLiterals(decodeRaw(bytes)).every(
    ([key, literal]) => !matchesField(key, 'line') || literal === 'null' || INTEGER_LITERAL.test(literal),
  )
}

// `{"class": "Foo", "line": 42}` renders as "Foo:42"; a bare JSON string renders as itself.
export const renderExtra: FieldRenderer = (_ctx, value) => {
  if (value.kind !== 'raw') return ''
  const extra = decodeAs(value.bytes, readExtraRecord)
  if (extra && hasIntegerLine(value.bytes)) return `${extra.class}:${extra.line.toString(10)}`
  return decodeOr(value.bytes, readString, '')
}
