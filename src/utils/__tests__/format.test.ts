import { describe, expect, it } from 'vitest'
import { describeValue, prefixLines, safeJsonStringify } from '@/utils/format'

describe('describeValue', () => {
  it('returns strings unchanged', () => {
    expect(describeValue('abc')).toBe('abc')
  })

  it('prints primitives', () => {
    expect(describeValue(0)).toBe('0')
    expect(describeValue(-2.5)).toBe('-2.5')
    expect(describeValue(true)).toBe('true')
    expect(describeValue(null)).toBe('null')
    expect(describeValue(undefined)).toBe('undefined')
    expect(describeValue(10n)).toBe('10')
  })

  it('prints objects and arrays as compact JSON', () => {
    expect(describeValue({ b: 'x', a: [1, null] })).toBe('{"b":"x","a":[1,null]}')
    expect(describeValue([])).toBe('[]')
  })

  it('prints errors by message', () => {
    expect(describeValue(new Error('disk full'))).toBe('disk full')
  })

  it('marks values JSON cannot represent', () => {
    const cyclic: Record<string, unknown> = {}
    cyclic.self = cyclic
    expect(describeValue(cyclic)).toBe('[Unserializable]')
    expect(describeValue({ n: 1n })).toBe('[Unserializable]')
  })
})

describe('safeJsonStringify', () => {
  it('indents by two spaces by default', () => {
    expect(safeJsonStringify({ a: 1 })).toBe('{\n  "a": 1\n}')
  })

  it('uses the fallback when nothing is produced', () => {
    expect(safeJsonStringify(undefined)).toBe('"[Unserializable]"')
    expect(safeJsonStringify({ toJSON: () => undefined }, 0, 'none')).toBe('none')
  })
})

describe('prefixLines', () => {
  it('precedes each line with a newline', () => {
    expect(prefixLines(['a', 'b'])).toBe('\na\nb')
    expect(prefixLines([])).toBe('')
  })
})
