import { AppConfigSchema, type AppConfig } from './schema.js'

/**
 * Get the default configuration.
 * These values are used when no config file or env vars are set.
 */
export function getDefaults(): AppConfig {
  return AppConfigSchema.parse({})
}
