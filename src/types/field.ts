// src/types/field.ts
//docstring
// Responsibility: the three input shapes a field renderer distinguishes.
// Boundary: type definitions only; constructors live in renderers/field_value.ts.

// Plain text value, rendered as-is by the default renderer.
export type TextField = {
  kind: 'text'
  text: string
}

// Undecoded JSON byte span taken straight from the log line.
export type RawField = {
  kind: 'raw'
  bytes: Uint8Array
}

// Anything the driver already decoded (maps, arrays, numbers, error records).
export type DecodedField = {
  kind: 'decoded'
  value: unknown
}

export type FieldValue = TextField | RawField | DecodedField
