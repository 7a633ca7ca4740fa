// src/renderers/records.ts
//docstring
// Responsibility: readers and guards for the record shapes in types/records.ts.
// Boundary: pure; missing keys take zero values, null leaves a field untouched.
import type { JsonObject, JsonValue } from '@/types/json'
import type { ErrorRecord, ExceptionRecord, ExtraRecord } from '@/types/records'

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null
}

const isJsonObject = (value: JsonValue): value is JsonObject => {
  return isRecord(value) && !Array.isArray(value)
}

export const isErrorRecord = (value: unknown): value is ErrorRecord => {
  if (!isRecord(value)) return false
  return typeof value.error === 'string' && typeof value.stack === 'string'
}

export const readString = (value: JsonValue): string | undefined => {
  return typeof value === 'string' ? value : undefined
}

// Non-string entries become '' so one bad line does not drop the rest.
export const readStringArray = (value: JsonValue): string[] | undefined => {
  if (value === null) return []
  if (!Array.isArray(value)) return undefined
  return value.map((item) => (typeof item === 'string' ? item : ''))
}

/** Key lookup is case-insensitive, as log producers disagree on `file` vs `File`. */
export const matchesField = (key: string, name: string): boolean => {
  return key === name || key.toLowerCase() === name.toLowerCase()
}

// Every value whose key names `name`, in document order; the last one wins.
const fieldValues = (record: JsonObject, name: string): JsonValue[] => {
  return Object.entries(record)
    .filter(([key]) => matchesField(key, name))
    .map(([, value]) => value)
}

export const emptyException = (): ExceptionRecord => ({ file: '', trace: [] })

// Fields are read independently: a bad `trace` does not discard a good `file`.
export const readExceptionRecord = (value: JsonValue): ExceptionRecord | undefined => {
  if (value === null) return emptyException()
  if (!isJsonObject(value)) return undefined

  const exception = emptyException()
  for (const file of fieldValues(value, 'file')) {
    if (typeof file === 'string') exception.file = file
  }
  for (const trace of fieldValues(value, 'trace')) {
    const lines = readStringArray(trace)
    if (lines) exception.trace = lines
  }
  return exception
}

export const readExtraRecord = (value: JsonValue): ExtraRecord | undefined => {
  if (value === null) return { class: '', line: 0 }
  if (!isJsonObject(value)) return undefined

  const extra: ExtraRecord = { class: '', line: 0 }
  for (const cls of fieldValues(value, 'class')) {
    if (cls === null) continue
    if (typeof cls !== 'string') return undefined
    extra.class = cls
  }
  for (const line of fieldValues(value, 'line')) {
    if (line === null) continue
    if (typeof line !== 'number' || !Number.isSafeInteger(line)) return undefined
    extra.line = line
  }
  return extra
}
