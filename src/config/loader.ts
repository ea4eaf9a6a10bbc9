import { ZodError } from 'zod'
import { AppConfigSchema, type AppConfig } from './schema.js'
import { getDefaults } from './defaults.js'
import { ConfigError } from './errors.js'
import { getConfigPath, getLocalConfigPath } from './paths.js'
import { parseEnvConfig } from './env.js'
import { fileExists, loadConfigFile } from './file.js'
import { deepMerge, type PlainObject } from './merge.js'

export interface LoadConfigOptions {
  /** Config file to read instead of DOCSIFT_HOME/config.json */
  configPath?: string
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv
  /** Applied last, over every other source */
  overrides?: PlainObject
}

/**
 * Validate a merged configuration object, reporting the first failing
 * field as a ConfigError.
 */
export function parseConfig(input: unknown): AppConfig {
  try {
    return AppConfigSchema.parse(input)
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0]
      const field = issue?.path.join('.') ?? ''
      throw new ConfigError(
        `Invalid configuration at '${field}': ${issue?.message ?? error.message}`,
        field
      )
    }
    throw error
  }
}

/**
 * Load configuration with full precedence chain.
 *
 * Precedence (later overrides earlier):
 * 1. Defaults
 * 2. User config file (config.json)
 * 3. Local overrides (config.local.json)
 * 4. Environment variables
 * 5. Overrides passed by the caller
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env
  let config: PlainObject = getDefaults()

  const configPath = options.configPath ?? getConfigPath(env)
  if (await fileExists(configPath)) {
    config = deepMerge(config, await loadConfigFile(configPath))
  }

  const localPath = options.configPath
    ? options.configPath.replace(/\.json$/, '.local.json')
    : getLocalConfigPath(env)
  if (await fileExists(localPath)) {
    config = deepMerge(config, await loadConfigFile(localPath))
  }

  config = deepMerge(config, parseEnvConfig(env))

  if (options.overrides) {
    config = deepMerge(config, options.overrides)
  }

  return parseConfig(config)
}
