import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import path from 'path'
import os from 'os'
import {
  resolveCredential,
  credentialExists,
  credentialEnvKey,
  CredentialStore,
} from '../../src/config/credentials.js'
import { ConfigError } from '../../src/config/errors.js'

describe('credentials', () => {
  let testDir: string
  let store: CredentialStore

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-creds-test-'))
    store = new CredentialStore(path.join(testDir, 'credentials.json'))
  })

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true })
  })

  describe('credentialEnvKey', () => {
    it('prefixes and upper-cases the reference', () => {
      expect(credentialEnvKey('anthropic_api_key')).toBe('DOCSIFT_ANTHROPIC_API_KEY')
    })
  })

  describe('resolveCredential', () => {
    it('returns env override when set', async () => {
      const value = await resolveCredential('anthropic_api_key', {
        env: { DOCSIFT_ANTHROPIC_API_KEY: 'test-secret' },
        store,
      })
      expect(value).toBe('test-secret')
    })

    it('falls back to the store', async () => {
      await store.set('openai_api_key', 'test-secret')

      const value = await resolveCredential('openai_api_key', { env: {}, store })
      expect(value).toBe('test-secret')
    })

    it('throws ConfigError when credential not found', async () => {
      const request = resolveCredential('openai_api_key', { env: {}, store })

      await expect(request).rejects.toThrow(ConfigError)
      await expect(request).rejects.toMatchObject({ field: 'openai_api_key' })
      await expect(request).rejects.toThrow('Set DOCSIFT_OPENAI_API_KEY')
    })
  })

  describe('credentialExists', () => {
    it('checks env and store', async () => {
      await store.set('stored_key', 'test-secret')

      expect(await credentialExists('stored_key', { env: {}, store })).toBe(true)
      expect(
        await credentialExists('env_key', { env: { DOCSIFT_ENV_KEY: 'test-secret' }, store })
      ).toBe(true)
      expect(await credentialExists('missing_key', { env: {}, store })).toBe(false)
    })
  })

  describe('CredentialStore', () => {
    it('persists values with owner-only permissions', async () => {
      await store.set('anthropic_api_key', 'test-secret')

      const content = JSON.parse(await fs.readFile(store.filePath, 'utf-8'))
      expect(content).toEqual({ anthropic_api_key: 'test-secret' })

      if (process.platform !== 'win32') {
        const stats = await fs.stat(store.filePath)
        expect(stats.mode & 0o777).toBe(0o600)
      }
    })

    it('loads values written by another instance', async () => {
      await store.set('a', '1')
      await store.set('b', '2')

      const reloaded = new CredentialStore(store.filePath)
      expect(await reloaded.list()).toEqual(['a', 'b'])
      expect(await reloaded.get('b')).toBe('2')
    })

    it('deletes values', async () => {
      await store.set('a', '1')
      await store.delete('a')
      expect(await store.get('a')).toBeUndefined()
    })

    it('rejects a malformed file', async () => {
      await fs.writeFile(store.filePath, '{"a": 1}')
      await expect(store.get('a')).rejects.toThrow('must map names to strings')
    })

    it('rejects invalid JSON', async () => {
      await fs.writeFile(store.filePath, 'nope')
      await expect(store.get('a')).rejects.toThrow('is not valid JSON')
    })
  })
})
