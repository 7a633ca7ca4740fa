import { describe, expect, it } from 'vitest'
import { createRenderContext, decodedField, rawField, textField } from '@/renderers/field_value'
import { renderTrace } from '@/renderers/trace_renderer'

const ctx = createRenderContext()

describe('renderTrace', () => {
  it('puts every trace line on its own line', () => {
    expect(renderTrace(ctx, rawField('["x","y"]'))).toBe('\nx\ny')
  })

  it('renders an empty list as an empty string', () => {
    expect(renderTrace(ctx, rawField('[]'))).toBe('')
    expect(renderTrace(ctx, rawField('null'))).toBe('')
  })

  it('renders invalid JSON as an empty string', () => {
    expect(renderTrace(ctx, rawField('["x",'))).toBe('')
    expect(renderTrace(ctx, rawField(''))).toBe('')
  })

  it('renders mistyped entries as empty lines and keeps the rest', () => {
    expect(renderTrace(ctx, rawField('["x", 1, null, "y"]'))).toBe('\nx\n\n\ny')
    expect(renderTrace(ctx, rawField('[{"a":1}, "z"]'))).toBe('\n\nz')
  })

  it('renders shapes other than a list as an empty string', () => {
    expect(renderTrace(ctx, rawField('{"trace":["x"]}'))).toBe('')
    expect(renderTrace(ctx, rawField('"x"'))).toBe('')
  })

  it('ignores values that are not raw JSON', () => {
    expect(renderTrace(ctx, textField('["x","y"]'))).toBe('')
    expect(renderTrace(ctx, decodedField(['x', 'y']))).toBe('')
  })

  it('keeps empty lines', () => {
    expect(renderTrace(ctx, rawField('["", "z"]'))).toBe('\n\nz')
  })
})
