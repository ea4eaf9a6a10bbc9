import { describe, it, expect } from 'vitest'
import { parseEnvConfig, parseValue } from '../../src/config/env.js'

describe('parseValue', () => {
  it('parses boolean true', () => {
    expect(parseValue('true')).toBe(true)
  })

  it('parses boolean false', () => {
    expect(parseValue('false')).toBe(false)
  })

  it('parses positive integers', () => {
    expect(parseValue('4096')).toBe(4096)
  })

  it('parses negative integers', () => {
    expect(parseValue('-42')).toBe(-42)
  })

  it('parses floats', () => {
    expect(parseValue('0.7')).toBe(0.7)
  })

  it('parses JSON arrays', () => {
    expect(parseValue('[{"condition":"safety_flags_present","reason":"r"}]')).toEqual([
      { condition: 'safety_flags_present', reason: 'r' },
    ])
  })

  it('parses JSON objects', () => {
    expect(parseValue('{"key":"value"}')).toEqual({ key: 'value' })
  })

  it('returns string for invalid JSON', () => {
    expect(parseValue('[invalid')).toBe('[invalid')
  })

  it('returns string for regular text', () => {
    expect(parseValue('claude-3-haiku-20240307')).toBe('claude-3-haiku-20240307')
  })
})

describe('parseEnvConfig', () => {
  it('converts DOCSIFT_MODELS__PRIMARY__PROVIDER to models.primary.provider', () => {
    const config = parseEnvConfig({ DOCSIFT_MODELS__PRIMARY__PROVIDER: 'openai' })
    expect(config).toEqual({ models: { primary: { provider: 'openai' } } })
  })

  it('camel-cases words inside a segment', () => {
    const config = parseEnvConfig({
      DOCSIFT_DETECTION__SAFETY_THRESHOLD: '0.6',
      DOCSIFT_MODELS__MAX_TOKENS: '2048',
    })
    expect(config).toEqual({
      detection: { safetyThreshold: 0.6 },
      models: { maxTokens: 2048 },
    })
  })

  it('parses boolean values', () => {
    const config = parseEnvConfig({ DOCSIFT_LOGGING__AUDIT__ENABLED: 'false' })
    expect(config).toEqual({ logging: { audit: { enabled: false } } })
  })

  it('skips DOCSIFT_HOME (reserved)', () => {
    expect(parseEnvConfig({ DOCSIFT_HOME: '/custom/path' })).toEqual({})
  })

  it('skips credential overrides', () => {
    const config = parseEnvConfig({
      DOCSIFT_ANTHROPIC_API_KEY: 'test-secret',
      DOCSIFT_SERVICE_TOKEN: 'test-secret',
    })
    expect(config).toEqual({})
  })

  it('keeps key references that are not credentials', () => {
    const config = parseEnvConfig({ DOCSIFT_PROVIDERS__OPENAI__API_KEY_REF: 'team_openai_key' })
    expect(config).toEqual({ providers: { openai: { apiKeyRef: 'team_openai_key' } } })
  })

  it('ignores variables without the prefix', () => {
    expect(parseEnvConfig({ PATH: '/usr/bin', OTHER_DETECTION__X: '1' })).toEqual({})
  })
})
