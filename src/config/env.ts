import { setPath, type PlainObject } from './merge.js'

export const ENV_PREFIX = 'DOCSIFT_'

// Reserved environment variables (not parsed into config)
const RESERVED_ENV_VARS = new Set(['DOCSIFT_HOME'])

// Credential overrides: DOCSIFT_<NAME>_API_KEY or DOCSIFT_<NAME>_TOKEN
const CREDENTIAL_ENV_PATTERN = /^DOCSIFT_[A-Z0-9_]+_(API_KEY|TOKEN)$/

function toCamelCase(segment: string): string {
  return segment.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase())
}

/**
 * Parse environment variables into a partial config object.
 *
 * Naming conventions:
 * - DOCSIFT_MODELS__PRIMARY__PROVIDER -> models.primary.provider
 *   (double underscore = nesting)
 * - DOCSIFT_DETECTION__SAFETY_THRESHOLD -> detection.safetyThreshold
 *   (single underscore inside a segment = camelCase)
 *
 * Reserved variables (not parsed):
 * - DOCSIFT_HOME (used for path resolution)
 * - DOCSIFT_*_API_KEY, DOCSIFT_*_TOKEN (credential overrides)
 */
export function parseEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): PlainObject {
  const config: PlainObject = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX)) continue
    if (value === undefined) continue
    if (RESERVED_ENV_VARS.has(key)) continue
    if (CREDENTIAL_ENV_PATTERN.test(key)) continue

    const path = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .split('__')
      .filter((segment) => segment.length > 0)
      .map(toCamelCase)
      .join('.')

    if (path) {
      setPath(config, path, parseValue(value))
    }
  }

  return config
}

/**
 * Parse a string value to its appropriate type.
 */
export function parseValue(value: string): unknown {
  // Boolean
  if (value === 'true') return true
  if (value === 'false') return false

  // Integer
  if (/^-?\d+$/.test(value)) return parseInt(value, 10)

  // Float
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)

  // JSON (arrays/objects)
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      return value
    }
  }

  return value
}
