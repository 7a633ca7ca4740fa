// src/utils/format.ts
//docstring
// Responsibility: text helpers shared by the renderers.
// Boundary: pure functions; no IO, no knowledge of field conventions.
export function safeJsonStringify(value: unknown, space = 2, fallback = '"[Unserializable]"'): string {
  try {
    const out = JSON.stringify(value, null, space)
    return typeof out === 'string' ? out : fallback
  } catch {
    return fallback
  }
}

/**
 * Generic text form of any value: strings as-is, objects and arrays as compact JSON,
 * everything else through `String`.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return value
  if (value === null) return 'null'
  if (value instanceof Error) return value.message
  if (typeof value === 'object') return safeJsonStringify(value, 0, '[Unserializable]')
  return String(value)
}

// Each line preceded by a newline, no other separator.
export function prefixLines(lines: readonly string[]): string {
  let out = ''
  for (const line of lines) out += `\n${line}`
  return out
}
