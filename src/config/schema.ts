import { z } from 'zod'
import { AUDIT_SEVERITIES } from '../audit/types.js'
import { STANDARD_HITL_RULES } from '../hitl/rules.js'
import { PROVIDER_NAMES } from '../provider/types.js'

// A model and the provider that serves it
export const ModelRefSchema = z.object({
  provider: z.enum(PROVIDER_NAMES),
  model: z.string().min(1),
})

// Model selection and generation settings
export const ModelsConfigSchema = z.object({
  primary: ModelRefSchema.default({ provider: 'anthropic', model: 'claude-3-haiku-20240307' }),
  secondary: ModelRefSchema.default({ provider: 'openai', model: 'gpt-3.5-turbo' }),
  maxTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0.1),
})

// Connection settings for one HTTP provider
function providerConnectionSchema(defaultKeyRef: string) {
  return z.object({
    apiKeyRef: z.string().min(1).default(defaultKeyRef),
    baseUrl: z.string().url().optional(),
    timeout: z.number().int().positive().default(120000),
    maxRetries: z.number().int().min(0).max(10).default(3),
  })
}

export const ProvidersConfigSchema = z.object({
  anthropic: providerConnectionSchema('anthropic_api_key').default({}),
  openai: providerConnectionSchema('openai_api_key').default({}),
})

// Dual-model verification
export const VerificationConfigSchema = z.object({
  enabled: z.boolean().default(true),
})

// Detector thresholds
export const DetectionConfigSchema = z.object({
  safetyThreshold: z.number().min(0).max(1).default(0.5),
  piiConfidenceThreshold: z.number().min(0).max(1).default(0.6),
})

export const HitlRuleSchema = z.object({
  condition: z.string().min(1),
  reason: z.string().min(1),
})

// Human review escalation rules, evaluated in order
export const HitlConfigSchema = z.object({
  rules: z
    .array(HitlRuleSchema)
    .default(() => STANDARD_HITL_RULES.map((rule) => ({ ...rule }))),
})

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(AUDIT_SEVERITIES).default('info'),
  audit: z
    .object({
      enabled: z.boolean().default(true),
      // Defaults to DOCSIFT_HOME/logs/audit
      directory: z.string().optional(),
    })
    .default({}),
})

// Full application configuration
export const AppConfigSchema = z.object({
  version: z.number().int().positive().default(1),
  models: ModelsConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
  verification: VerificationConfigSchema.default({}),
  detection: DetectionConfigSchema.default({}),
  hitl: HitlConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type ModelRefConfig = z.infer<typeof ModelRefSchema>
export type ModelsConfig = z.infer<typeof ModelsConfigSchema>
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>
export type ProviderConnectionConfig = ProvidersConfig['anthropic']
export type VerificationConfig = z.infer<typeof VerificationConfigSchema>
export type DetectionConfig = z.infer<typeof DetectionConfigSchema>
export type HitlConfig = z.infer<typeof HitlConfigSchema>
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>
