import type { PiiType } from '../detection/pii/types.js'
import type { SafetyCategory } from '../detection/safety/types.js'

/**
 * Sensitivity categories a model may assign.
 */
export const CLASSIFICATION_CATEGORIES = [
  'Public',
  'Confidential',
  'Highly Sensitive',
  'Unsafe',
] as const

export type ClassificationCategory = (typeof CLASSIFICATION_CATEGORIES)[number]

/**
 * Sentinel for model output that could not be mapped to a category.
 */
export const UNKNOWN_CATEGORY = 'Unknown'

export type ResultCategory = ClassificationCategory | typeof UNKNOWN_CATEGORY

/**
 * Evidence types. Models cite text, image or metadata evidence;
 * the pipeline adds pii and safety_violation citations.
 */
export const EVIDENCE_TYPES = ['text', 'image', 'metadata', 'pii', 'safety_violation'] as const

export type EvidenceType = (typeof EVIDENCE_TYPES)[number]

/**
 * One piece of evidence supporting a classification.
 */
export interface Citation {
  /** Page the evidence comes from, null when unknown */
  pageNumber: number | null
  evidenceType: EvidenceType
  evidenceText: string
  relevance: string
  /** Relevance score in [0, 1] */
  relevanceScore: number
  piiType?: PiiType
  safetyCategory?: SafetyCategory
}

/**
 * Outcome of cross-checking with a second model.
 */
export interface VerificationOutcome {
  verified: boolean
  /** Agreement score in [0, 1] */
  agreementScore: number
  secondary: ClassificationResult
}

/**
 * A parsed model classification.
 */
export interface ClassificationResult {
  category: ResultCategory
  /** Confidence in [0, 1] */
  confidence: number
  reasoning: string
  summary: string
  citations: Citation[]
  secondaryCategories: ClassificationCategory[]
  /** False when the model output could not be decoded */
  structured: boolean
  verification?: VerificationOutcome
}
