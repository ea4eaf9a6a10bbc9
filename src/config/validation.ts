import type { AppConfig } from './schema.js'
import { credentialExists, credentialEnvKey, type CredentialLookupOptions } from './credentials.js'
import { ConfigError } from './errors.js'
import { compileRule } from '../hitl/rules.js'

export interface ValidationError {
  path: string
  message: string
  suggestion?: string
}

export interface ValidationWarning {
  path: string
  message: string
}

export interface ValidationResult {
  valid: boolean
  errors: ValidationError[]
  warnings: ValidationWarning[]
}

// Highest confidence the safety checker assigns
const MAX_SAFETY_CONFIDENCE = 0.8

/**
 * Validate a configuration for semantic correctness.
 * This goes beyond Zod schema validation: credentials for the providers
 * in use must exist and every HITL rule must compile.
 */
export async function validateConfig(
  config: AppConfig,
  options: CredentialLookupOptions = {}
): Promise<ValidationResult> {
  const errors: ValidationError[] = []
  const warnings: ValidationWarning[] = []

  const models = [{ path: 'models.primary', ref: config.models.primary }]
  if (config.verification.enabled) {
    models.push({ path: 'models.secondary', ref: config.models.secondary })
  }

  const checked = new Set<string>()
  for (const { path, ref } of models) {
    if (ref.provider === 'mock' || checked.has(ref.provider)) continue
    checked.add(ref.provider)

    const keyRef = config.providers[ref.provider].apiKeyRef
    if (!(await credentialExists(keyRef, options))) {
      errors.push({
        path: `providers.${ref.provider}.apiKeyRef`,
        message: `Credential '${keyRef}' for ${path} (${ref.provider}) not found`,
        suggestion: `Set ${credentialEnvKey(keyRef)} or add it to credentials.json`,
      })
    }
  }

  config.hitl.rules.forEach((rule, index) => {
    try {
      compileRule(rule)
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error
      errors.push({ path: `hitl.rules.${index}.condition`, message: error.message })
    }
  })

  if (
    config.verification.enabled &&
    config.models.primary.provider === config.models.secondary.provider &&
    config.models.primary.model === config.models.secondary.model
  ) {
    warnings.push({
      path: 'models.secondary',
      message: 'Dual verification uses the same model twice; agreement will be uninformative.',
    })
  }

  if (config.detection.safetyThreshold > MAX_SAFETY_CONFIDENCE) {
    warnings.push({
      path: 'detection.safetyThreshold',
      message: `Safety threshold is above ${MAX_SAFETY_CONFIDENCE}; no content can ever be flagged.`,
    })
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}
