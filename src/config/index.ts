// Schema and types
export { AppConfigSchema, type AppConfig } from './schema.js'
export type {
  ModelRefConfig,
  ModelsConfig,
  ProvidersConfig,
  ProviderConnectionConfig,
  VerificationConfig,
  DetectionConfig,
  HitlConfig,
  LoggingConfig,
} from './schema.js'

// Errors
export { ConfigError } from './errors.js'

// Defaults
export { getDefaults } from './defaults.js'

// Paths
export {
  getDocsiftHome,
  getConfigPath,
  getLocalConfigPath,
  getCredentialsPath,
  getLogsPath,
  getAuditPath,
} from './paths.js'

// Environment parsing
export { ENV_PREFIX, parseEnvConfig, parseValue } from './env.js'

// File utilities
export { fileExists, loadConfigFile, saveConfigFile } from './file.js'

// Merge utilities
export { deepMerge, setPath, getPath, isPlainObject, type PlainObject } from './merge.js'

// Loader
export { loadConfig, parseConfig, type LoadConfigOptions } from './loader.js'

// Pipeline settings
export { toPipelineConfig, type PipelineConfig } from './pipeline.js'

// Credentials
export {
  resolveCredential,
  credentialExists,
  credentialEnvKey,
  CredentialStore,
  getCredentialStore,
  type CredentialLookupOptions,
} from './credentials.js'

// Validation
export {
  validateConfig,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validation.js'
