// src/renderers/level_renderer.ts
import { decodeOr } from './decode'
import { readString } from './records'
import type { FieldRenderer } from './types'

export const shortenLevel = (level: string): string => {
  switch (level) {
    case 'WARNING':
      return 'WARN'
    case 'CRITICAL':
      return 'CRIT'
    default:
      return level
  }
}

export const renderLevel: FieldRenderer = (_ctx, value) => {
  if (value.kind !== 'raw') return ''
  return shortenLevel(decodeOr(value.bytes, readString, ''))
}
