// src/renderers/decode.ts
//docstring
// Responsibility: best-effort JSON decoding of raw field bytes with typed fallbacks.
// Boundary: never throws; failures go to logger.debug and come back as a fallback value.
import type { JsonValue } from '@/types/json'
import { logger } from '@/utils/logger'

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string }

// Reads a decoded JSON value into T, or returns undefined when the shape does not fit.
export type JsonReader<T> = (value: JsonValue) => T | undefined

// A leading BOM is kept: it is part of the raw text and is not valid JSON.
const utf8 = new TextDecoder('utf-8', { ignoreBOM: true })

export const decodeRaw = (bytes: Uint8Array): string => utf8.decode(bytes)

export const decodeJson = (bytes: Uint8Array): DecodeResult<JsonValue> => {
  const text = decodeRaw(bytes)
  try {
    const value: JsonValue = JSON.parse(text)
    return { ok: true, value }
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) }
  }
}

export const decodeAs = <T>(bytes: Uint8Array, read: JsonReader<T>): T | undefined => {
  const decoded = decodeJson(bytes)
  if (!decoded.ok) {
    logger.debug('field is not valid JSON', { reason: decoded.error, length: bytes.length })
    return undefined
  }
  const value = read(decoded.value)
  if (value === undefined) {
    logger.debug('field JSON has an unexpected shape', { value: decoded.value })
  }
  return value
}

export const decodeOr = <T>(bytes: Uint8Array, read: JsonReader<T>, fallback: T): T => {
  return decodeAs(bytes, read) ?? fallback
}

// JSON.parse turns overflowing literals such as 1e400 into Infinity.
export const hasNonFinite = (value: JsonValue): boolean => {
  if (typeof value === 'number') return !Number.isFinite(value)
  if (Array.isArray(value)) return value.some(hasNonFinite)
  if (value !== null && typeof value === 'object') return Object.values(value).some(hasNonFinite)
  return false
}

const TOKEN = /"(?:[^"\\]|\\.)*"|[{}[\],:]|[^\s{}[\],:"]+/g

/**
 * Key and value source text for each scalar member of a top-level JSON object,
 * in document order. Nested objects and arrays are skipped. Expects text that
 * already parsed.
 */
export const scanTopLevelLiterals = (text: string): Array<[key: string, literal: string]> => {
  const out: Array<[string, string]> = []
  let depth = 0
  let key: string | undefined
  let awaitingValue = false

  for (const match of text.matchAll(TOKEN)) {
    const token = match[0]
    if (token === '{' || token === '[') {
      if (depth === 1) awaitingValue = false
      depth++
      continue
    }
    if (token === '}' || token === ']') {
      depth--
      continue
    }
    if (depth !== 1) continue
    if (token === ':') {
      awaitingValue = true
    } else if (token === ',') {
      key = undefined
    } else if (awaitingValue) {
      if (key !== undefined) out.push([key, token])
      awaitingValue = false
    } else {
      const parsed: unknown = JSON.parse(token)
      key = typeof parsed === 'string' ? parsed : undefined
    }
  }
  return out
}
