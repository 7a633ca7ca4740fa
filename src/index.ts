// src/index.ts
//docstring
// Responsibility: package entry; renderers, their input types and the driver-facing lookup.
export * from './renderers'
export type * from './types'
export { describeValue, safeJsonStringify, prefixLines, createLogger, logger, InvariantError } from './utils'
export type { Logger, LogLevel, LogMeta } from './utils'
export { readEnv, env, type Env, type EnvSource } from './config/env'
export { loadFieldOverrides, parseFieldOverrides } from './config/overrides'
