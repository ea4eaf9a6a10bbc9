import { describe, it, expect } from 'vitest'
import path from 'path'
import os from 'os'
import {
  getDocsiftHome,
  getConfigPath,
  getLocalConfigPath,
  getCredentialsPath,
  getLogsPath,
  getAuditPath,
} from '../../src/config/paths.js'

describe('getDocsiftHome', () => {
  it('returns DOCSIFT_HOME when set', () => {
    expect(getDocsiftHome({ DOCSIFT_HOME: '/custom/docsift' })).toBe('/custom/docsift')
  })

  it('prefers DOCSIFT_HOME over XDG_CONFIG_HOME', () => {
    expect(
      getDocsiftHome({ DOCSIFT_HOME: '/custom/docsift', XDG_CONFIG_HOME: '/home/user/.config' })
    ).toBe('/custom/docsift')
  })

  it('returns XDG_CONFIG_HOME/docsift when set', () => {
    expect(getDocsiftHome({ XDG_CONFIG_HOME: '/home/user/.config' })).toBe(
      path.join('/home/user/.config', 'docsift')
    )
  })

  it('falls back to a directory under the home directory', () => {
    expect(getDocsiftHome({}).startsWith(os.homedir())).toBe(true)
  })
})

describe('derived paths', () => {
  const env = { DOCSIFT_HOME: '/data/docsift' }

  it('places files under the home directory', () => {
    expect(getConfigPath(env)).toBe(path.join('/data/docsift', 'config.json'))
    expect(getLocalConfigPath(env)).toBe(path.join('/data/docsift', 'config.local.json'))
    expect(getCredentialsPath(env)).toBe(path.join('/data/docsift', 'credentials.json'))
    expect(getLogsPath(env)).toBe(path.join('/data/docsift', 'logs'))
    expect(getAuditPath(env)).toBe(path.join('/data/docsift', 'logs', 'audit'))
  })
})
