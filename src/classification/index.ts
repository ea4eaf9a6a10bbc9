export {
  CLASSIFICATION_CATEGORIES,
  UNKNOWN_CATEGORY,
  EVIDENCE_TYPES,
  type ClassificationCategory,
  type ResultCategory,
  type EvidenceType,
  type Citation,
  type VerificationOutcome,
  type ClassificationResult,
} from './types.js'
export { matchCategory, normalizeCategory } from './categories.js'
export {
  parseClassificationResponse,
  extractJsonCandidate,
  fallbackClassification,
  type ParseOptions,
} from './parse.js'
export { computeAgreement } from './agreement.js'
export { mergeCitations, piiCitations, safetyCitations } from './citations.js'
