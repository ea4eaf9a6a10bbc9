import type { Severity } from '../severity.js'

/**
 * Unsafe content categories.
 */
export const SAFETY_CATEGORIES = [
  'child_safety',
  'hate_speech',
  'violence',
  'exploitative',
  'criminal',
  'cyber_threat',
  'political_misinfo',
] as const

export type SafetyCategory = (typeof SAFETY_CATEGORIES)[number]

/**
 * Severity of a single flag. A flag is never 'none'.
 */
export type FlagSeverity = Exclude<Severity, 'none'>

/**
 * One keyword occurrence.
 */
export interface SafetyMatch {
  keyword: string
  /** Trimmed text around the keyword */
  context: string
  position: number
}

/**
 * One category violation on one page.
 */
export interface SafetyFlag {
  category: SafetyCategory
  severity: FlagSeverity
  description: string
  matches: SafetyMatch[]
  pageNumber: number
  confidence: number
  /** Whether a safe-context indicator reduced the confidence */
  safeContext: boolean
}

/**
 * Aggregated safety assessment.
 */
export interface SafetyResult {
  isSafe: boolean
  totalFlags: number
  flags: SafetyFlag[]
  overallSeverity: Severity
  requiresReview: boolean
  categoriesFlagged: SafetyCategory[]
}

/**
 * Keyword set, severity and description of one category.
 */
export interface SafetyCategoryDefinition {
  keywords: string[]
  severity: FlagSeverity
  description: string
}

/**
 * Full category table plus the safe-context indicators.
 */
export interface SafetyTaxonomy {
  categories: Record<SafetyCategory, SafetyCategoryDefinition>
  safeContexts: string[]
}

/**
 * Checker options.
 */
export interface ContentSafetyCheckerOptions {
  /** Minimum confidence for a category to be flagged (default 0.5) */
  threshold?: number
  /** Characters of context captured on each side of a keyword (default 50) */
  contextRadius?: number
  /** Category table (defaults to data/safety-taxonomy.json) */
  taxonomy?: SafetyTaxonomy
}
