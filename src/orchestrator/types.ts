import type { AuditLogger } from '../audit/service.js'
import type { ClassificationResult } from '../classification/types.js'
import type { PiiDetector } from '../detection/pii/detector.js'
import type { PiiResult } from '../detection/pii/types.js'
import type { ContentSafetyChecker } from '../detection/safety/checker.js'
import type { SafetyResult } from '../detection/safety/types.js'
import type { DocumentMetadata } from '../document/types.js'
import type { HitlRuleEngine } from '../hitl/engine.js'
import type { HitlDecision } from '../hitl/types.js'
import type { PromptBuilder } from '../prompt/types.js'
import type { ModelGateway } from '../provider/gateway.js'
import type { ProviderErrorCode } from '../provider/types.js'

/**
 * Why a classification failed.
 */
export type FailureCode = 'config_error' | 'aborted' | 'internal_error' | ProviderErrorCode

/**
 * Models that produced a completed classification.
 */
export interface ModelsUsed {
  primary: string
  secondary?: string
}

interface OutcomeBase {
  documentId: string
  /** Wall-clock duration of the run in ms */
  processingTimeMs: number
}

export interface CompletedOutcome extends OutcomeBase {
  status: 'completed'
  classification: ClassificationResult
  pii: PiiResult
  safety: SafetyResult
  hitl: HitlDecision
  document: DocumentMetadata
  models: ModelsUsed
}

/**
 * Short-circuit result: unsafe content never reaches a model.
 */
export interface BlockedOutcome extends OutcomeBase {
  status: 'blocked'
  classification: ClassificationResult
  pii: PiiResult
  safety: SafetyResult
  document: DocumentMetadata
}

/**
 * Terminal failure. Carries no partial results.
 */
export interface FailedOutcome extends OutcomeBase {
  status: 'failed'
  code: FailureCode
  /** Sanitized error message */
  error: string
}

export type ClassificationOutcome = CompletedOutcome | BlockedOutcome | FailedOutcome

export type ClassificationStatus = ClassificationOutcome['status']

/**
 * Per-call options.
 */
export interface ClassifyOptions {
  /** Overrides the configured dual verification flag */
  dualVerification?: boolean
  /** Aborts the run; checked around every model call */
  signal?: AbortSignal
  /** Correlates audit entries; a UUID is generated when absent */
  documentId?: string
}

/**
 * Pipeline dependencies. Detectors and the rule engine are built from
 * the pipeline config unless supplied.
 */
export interface PipelineDependencies {
  gateway: ModelGateway
  promptBuilder: PromptBuilder
  auditLogger: AuditLogger
  piiDetector?: PiiDetector
  safetyChecker?: ContentSafetyChecker
  hitlEngine?: HitlRuleEngine
}
