import { describe, it, expect } from 'vitest'
import { deepMerge, getPath, isPlainObject, setPath } from '../../src/config/merge.js'

describe('deepMerge', () => {
  it('merges nested objects', () => {
    const result = deepMerge(
      { models: { primary: { provider: 'anthropic', model: 'a' }, maxTokens: 4096 } },
      { models: { primary: { model: 'b' } } }
    )
    expect(result).toEqual({
      models: { primary: { provider: 'anthropic', model: 'b' }, maxTokens: 4096 },
    })
  })

  it('replaces arrays', () => {
    const result = deepMerge({ rules: [1, 2, 3] }, { rules: [4] })
    expect(result).toEqual({ rules: [4] })
  })

  it('ignores undefined source values', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 })
  })

  it('does not mutate its inputs', () => {
    const target = { nested: { a: 1 } }
    deepMerge(target, { nested: { b: 2 } })
    expect(target).toEqual({ nested: { a: 1 } })
  })
})

describe('setPath and getPath', () => {
  it('creates intermediate objects', () => {
    const obj: Record<string, unknown> = {}
    setPath(obj, 'logging.audit.enabled', false)
    expect(obj).toEqual({ logging: { audit: { enabled: false } } })
    expect(getPath(obj, 'logging.audit.enabled')).toBe(false)
  })

  it('replaces non-object intermediates', () => {
    const obj: Record<string, unknown> = { logging: 'off' }
    setPath(obj, 'logging.level', 'debug')
    expect(obj).toEqual({ logging: { level: 'debug' } })
  })

  it('returns undefined for a missing path', () => {
    expect(getPath({ a: 1 }, 'a.b.c')).toBeUndefined()
  })
})

describe('isPlainObject', () => {
  it('accepts only non-array objects', () => {
    expect(isPlainObject({})).toBe(true)
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject('x')).toBe(false)
  })
})
