import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from '@/utils/logger'

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const log = createLogger('warn')
    log.debug('hidden')
    log.info('hidden')
    log.warn('shown')

    expect(debug).not.toHaveBeenCalled()
    expect(info).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('shown')
  })

  it('passes meta as a second argument', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    createLogger('debug').error('failed', { field: 'level' })
    expect(error).toHaveBeenCalledWith('failed', { field: 'level' })
  })

  it('emits everything at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    createLogger('debug').debug('decode failed')
    expect(debug).toHaveBeenCalledWith('decode failed')
  })
})
