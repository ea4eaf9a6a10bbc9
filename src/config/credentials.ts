import { promises as fs } from 'fs'
import path from 'path'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { getCredentialsPath } from './paths.js'
import { fileExists } from './file.js'
import { ENV_PREFIX } from './env.js'

const CredentialFileSchema = z.record(z.string())

export interface CredentialLookupOptions {
  env?: NodeJS.ProcessEnv
  store?: CredentialStore
}

/**
 * Environment variable that overrides a credential.
 * anthropic_api_key -> DOCSIFT_ANTHROPIC_API_KEY
 */
export function credentialEnvKey(ref: string): string {
  return `${ENV_PREFIX}${ref.toUpperCase()}`
}

/**
 * Resolve a credential by name.
 * Resolution order:
 * 1. Environment variable (DOCSIFT_<NAME>)
 * 2. Credential store
 */
export async function resolveCredential(
  ref: string,
  options: CredentialLookupOptions = {}
): Promise<string> {
  const env = options.env ?? process.env
  const envKey = credentialEnvKey(ref)
  const fromEnv = env[envKey]
  if (fromEnv) {
    return fromEnv
  }

  const store = options.store ?? getCredentialStore()
  const value = await store.get(ref)

  if (!value) {
    throw new ConfigError(
      `Credential '${ref}' not found. ` +
        `Set ${envKey} or add '${ref}' to ${store.filePath}`,
      ref
    )
  }

  return value
}

/**
 * Check if a credential exists.
 */
export async function credentialExists(
  ref: string,
  options: CredentialLookupOptions = {}
): Promise<boolean> {
  const env = options.env ?? process.env
  if (env[credentialEnvKey(ref)]) {
    return true
  }

  const store = options.store ?? getCredentialStore()
  return (await store.get(ref)) !== undefined
}

let credentialStoreInstance: CredentialStore | null = null

/**
 * Get the shared credential store for the default credentials file.
 */
export function getCredentialStore(): CredentialStore {
  if (!credentialStoreInstance) {
    credentialStoreInstance = new CredentialStore()
  }
  return credentialStoreInstance
}

/**
 * File-based credential store: a JSON object of name to secret, written
 * with owner-only permissions.
 */
export class CredentialStore {
  private cache: Map<string, string> = new Map()
  private loaded = false

  constructor(readonly filePath: string = getCredentialsPath()) {}

  async get(name: string): Promise<string | undefined> {
    await this.ensureLoaded()
    return this.cache.get(name)
  }

  async set(name: string, value: string): Promise<void> {
    await this.ensureLoaded()
    this.cache.set(name, value)
    await this.save()
  }

  async delete(name: string): Promise<void> {
    await this.ensureLoaded()
    this.cache.delete(name)
    await this.save()
  }

  async list(): Promise<string[]> {
    await this.ensureLoaded()
    return Array.from(this.cache.keys())
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return

    if (await fileExists(this.filePath)) {
      const content = await fs.readFile(this.filePath, 'utf-8')
      let data: unknown
      try {
        data = JSON.parse(content)
      } catch {
        throw new ConfigError(`Credentials file ${this.filePath} is not valid JSON`)
      }

      const parsed = CredentialFileSchema.safeParse(data)
      if (!parsed.success) {
        throw new ConfigError(
          `Credentials file ${this.filePath} must map names to strings`
        )
      }
      for (const [key, value] of Object.entries(parsed.data)) {
        this.cache.set(key, value)
      }
    }

    this.loaded = true
  }

  private async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true })
    await fs.writeFile(this.filePath, JSON.stringify(Object.fromEntries(this.cache), null, 2), {
      mode: 0o600, // Owner read/write only
    })
  }
}
