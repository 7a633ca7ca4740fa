// src/renderers/index.ts
export * from './decode'
export * from './default_renderer'
export * from './error_renderer'
export * from './exception_renderer'
export * from './extra_renderer'
export * from './field_value'
export * from './level_renderer'
export * from './records'
export * from './registry'
export * from './trace_renderer'
export * from './types'
