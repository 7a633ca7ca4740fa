// src/types/json.ts
//docstring
// Responsibility: JSON value types produced by the generic field decoder.
// Boundary: type definitions only; no runtime code.
export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonObject | JsonArray
export type JsonObject = { [key: string]: JsonValue }
export type JsonArray = JsonValue[]
