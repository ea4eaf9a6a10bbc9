import { clampScore } from '../detection/severity.js'
import type { ClassificationResult } from './types.js'

const CATEGORY_WEIGHT = 0.7
const CONFIDENCE_WEIGHT = 0.3

/**
 * Agreement between two classifications:
 * 0.7 × (same category) + 0.3 × (1 − |confidence difference|).
 */
export function computeAgreement(
  primary: Pick<ClassificationResult, 'category' | 'confidence'>,
  secondary: Pick<ClassificationResult, 'category' | 'confidence'>
): number {
  const categoryMatch = primary.category === secondary.category ? 1 : 0
  const confidenceSimilarity = 1 - Math.abs(primary.confidence - secondary.confidence)

  return clampScore(
    CATEGORY_WEIGHT * categoryMatch + CONFIDENCE_WEIGHT * confidenceSimilarity
  )
}
