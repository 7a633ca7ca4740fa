// src/utils/logger.ts
//docstring
// Responsibility: shared logging interface over console, filtered by a minimum level.
// Boundary: wraps console only; never throws and never decides what gets rendered.
import { env } from '@/config/env'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogMeta = Record<string, unknown>

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function createLogger(minLevel: LogLevel): Logger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return
    const payload = meta ? [message, meta] : [message]
    console[level](...payload)
  }

  return {
    debug: (m, meta) => emit('debug', m, meta),
    info: (m, meta) => emit('info', m, meta),
    warn: (m, meta) => emit('warn', m, meta),
    error: (m, meta) => emit('error', m, meta),
  }
}

export const logger: Logger = createLogger(env.logLevel)
