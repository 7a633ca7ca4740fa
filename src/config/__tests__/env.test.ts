import { describe, expect, it } from 'vitest'
import { readEnv } from '@/config/env'

describe('readEnv', () => {
  it('defaults to warn with no overrides', () => {
    expect(readEnv({})).toEqual({ logLevel: 'warn', fieldOverrides: undefined })
  })

  it('normalises the log level', () => {
    expect(readEnv({ FIELD_RENDER_LOG_LEVEL: ' INFO ' }).logLevel).toBe('info')
    expect(readEnv({ FIELD_RENDER_LOG_LEVEL: 'debug' }).logLevel).toBe('debug')
    expect(readEnv({ FIELD_RENDER_LOG_LEVEL: 'loud' }).logLevel).toBe('warn')
  })

  it('keeps the raw override string and treats blank as unset', () => {
    expect(readEnv({ FIELD_RENDER_OVERRIDES: ' msg=error ' }).fieldOverrides).toBe('msg=error')
    expect(readEnv({ FIELD_RENDER_OVERRIDES: '   ' }).fieldOverrides).toBeUndefined()
  })
})
