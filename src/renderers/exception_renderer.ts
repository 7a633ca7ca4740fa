// src/renderers/exception_renderer.ts
import { prefixLines } from '@/utils/format'
import { decodeOr } from './decode'
import { emptyException, readExceptionRecord } from './records'
import type { FieldRenderer } from './types'

/**
 * File name followed by one line per trace entry. An empty file name still
 * leads, so a bare trace starts with a newline.
 */
export const renderException: FieldRenderer = (_ctx, value) => {
  if (value.kind !== 'raw') return ''
  const exception = decodeOr(value.bytes, readExceptionRecord, emptyException())
  return exception.file + prefixLines(exception.trace)
}
