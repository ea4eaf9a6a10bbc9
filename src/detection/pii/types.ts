import type { Severity } from '../severity.js'

/**
 * Supported PII types.
 */
export const PII_TYPES = [
  'ssn',
  'credit_card',
  'email',
  'phone',
  'account_number',
  'drivers_license',
  'passport',
  'date_of_birth',
] as const

export type PiiType = (typeof PII_TYPES)[number]

/**
 * PII severity never reaches 'critical'.
 */
export type PiiSeverity = Exclude<Severity, 'critical'>

/**
 * One accepted PII match.
 */
export interface PiiDetection {
  type: PiiType
  /** Masked value, e.g. 12*******89 */
  value: string
  /** Surrounding text with the raw value masked */
  context: string
  /** Character offset of the value in the page text */
  position: number
  pageNumber: number
  /** Confidence in [0, 1] */
  confidence: number
  // NOTE: Never include the raw value
}

/**
 * Result of PII detection over one page or a whole document.
 */
export interface PiiResult {
  detected: boolean
  /** Distinct types, in order of first detection */
  types: PiiType[]
  detections: PiiDetection[]
  totalDetections: number
  severity: PiiSeverity
}

/**
 * Definition of one PII type: how to find candidates and how to validate them.
 */
export interface PiiTypeDefinition {
  type: PiiType
  /**
   * Candidate patterns. A named group `value` narrows the reported value
   * to part of the match (e.g. the digits after an "Account" label).
   */
  patterns: RegExp[]
  /** Lower-case keywords that raise confidence when found near the match */
  contextKeywords: string[]
  /** Structural check; a failing candidate is rejected outright */
  validate?: (value: string) => boolean
  /** Confidence added when `validate` passes */
  structuralBonus: number
}

/**
 * Detector options.
 */
export interface PiiDetectorOptions {
  /** Minimum confidence for a candidate to be accepted (default 0.6) */
  confidenceThreshold?: number
  /** Characters of context captured on each side of a match (default 50) */
  contextRadius?: number
}
