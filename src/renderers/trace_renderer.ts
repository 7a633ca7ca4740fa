// src/renderers/trace_renderer.ts
import { prefixLines } from '@/utils/format'
import { decodeOr } from './decode'
import { readStringArray } from './records'
import type { FieldRenderer } from './types'

export const renderTrace: FieldRenderer = (_ctx, value) => {
  if (value.kind !== 'raw') return ''
  return prefixLines(decodeOr(value.bytes, readStringArray, []))
}
