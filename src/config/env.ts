// src/config/env.ts
//docstring
// Responsibility: read process environment into a plain settings object.
// Boundary: no rendering logic; no dependency on renderers.
import type { LogLevel } from '@/utils/logger'

export type EnvSource = Record<string, string | undefined>

export type Env = {
  logLevel: LogLevel
  fieldOverrides: string | undefined
}

const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

const normalizeLogLevel = (value: string | undefined): LogLevel => {
  const raw = (value ?? '').trim().toLowerCase()
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') return raw
  return DEFAULT_LOG_LEVEL
}

export const readEnv = (source: EnvSource = process.env): Env => {
  const overrides = source.FIELD_RENDER_OVERRIDES?.trim()
  return {
    logLevel: normalizeLogLevel(source.FIELD_RENDER_LOG_LEVEL),
    fieldOverrides: overrides ? overrides : undefined,
  }
}

export const env: Env = readEnv()
