import type { HitlRule } from '../hitl/types.js'
import type { ModelRef } from '../provider/gateway.js'
import type { AppConfig } from './schema.js'

/**
 * Settings read by the classification pipeline. Built once from the
 * application config and frozen; detectors, rule engine and orchestrator
 * all receive the same object.
 */
export interface PipelineConfig {
  readonly primaryModel: Readonly<ModelRef>
  readonly secondaryModel: Readonly<ModelRef>
  readonly maxTokens: number
  readonly temperature: number
  readonly dualVerification: boolean
  readonly safetyThreshold: number
  readonly piiConfidenceThreshold: number
  readonly hitlRules: readonly Readonly<HitlRule>[]
}

export function toPipelineConfig(config: AppConfig): PipelineConfig {
  return Object.freeze({
    primaryModel: Object.freeze({ ...config.models.primary }),
    secondaryModel: Object.freeze({ ...config.models.secondary }),
    maxTokens: config.models.maxTokens,
    temperature: config.models.temperature,
    dualVerification: config.verification.enabled,
    safetyThreshold: config.detection.safetyThreshold,
    piiConfidenceThreshold: config.detection.piiConfidenceThreshold,
    hitlRules: Object.freeze(config.hitl.rules.map((rule) => Object.freeze({ ...rule }))),
  })
}
