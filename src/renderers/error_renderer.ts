// src/renderers/error_renderer.ts
import type { ErrorRecord } from '@/types/records'
import { renderDefault } from './default_renderer'
import { isErrorRecord } from './records'
import type { FieldRenderer } from './types'

// "\n  <message>\n" followed by the stack with every line tab-indented.
export const formatErrorRecord = (record: ErrorRecord): string => {
  const stack = '\t' + record.stack.split('\n').join('\n\t')
  return `\n  ${record.error}\n${stack}`
}

/** Multiline error block for decoded error records; anything else renders as the default would. */
export const renderError: FieldRenderer = (ctx, value) => {
  if (value.kind === 'decoded' && isErrorRecord(value.value)) return formatErrorRecord(value.value)
  return renderDefault(ctx, value)
}
