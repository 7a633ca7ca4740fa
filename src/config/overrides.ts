// src/config/overrides.ts
//docstring
// Responsibility: parse `field=kind` renderer overrides from configuration.
// Boundary: unknown kinds are dropped with a warning; parsing never throws.
import { isRendererKind, type FieldRendererMap } from '@/renderers/registry'
import type { RendererKind } from '@/renderers/types'
import { logger } from '@/utils/logger'
import { env } from './env'

export const parseFieldOverrides = (raw: string | undefined): FieldRendererMap => {
  const out: Record<string, RendererKind> = {}
  if (!raw) return out

  for (const segment of raw.split(',')) {
    const pair = segment.trim()
    if (!pair) continue
    const eq = pair.indexOf('=')
    if (eq <= 0) {
      logger.warn('ignoring malformed renderer override', { pair })
      continue
    }
    const field = pair.slice(0, eq).trim().toLowerCase()
    const kind = pair.slice(eq + 1).trim().toLowerCase()
    if (!isRendererKind(kind)) {
      logger.warn('ignoring renderer override with unknown kind', { field, kind })
      continue
    }
    out[field] = kind
  }

  return out
}

export const loadFieldOverrides = (): FieldRendererMap => parseFieldOverrides(env.fieldOverrides)
