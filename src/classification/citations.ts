import type { PiiResult } from '../detection/pii/types.js'
import type { SafetyResult } from '../detection/safety/types.js'
import type { Citation } from './types.js'

/**
 * One citation per PII detection. The evidence is the redacted context.
 */
export function piiCitations(pii: PiiResult): Citation[] {
  return pii.detections.map((detection): Citation => ({
    pageNumber: detection.pageNumber,
    evidenceType: 'pii',
    evidenceText: detection.context,
    relevance: `PII detected: ${detection.type}`,
    relevanceScore: detection.confidence,
    piiType: detection.type,
  }))
}

/**
 * One citation per keyword match of every safety flag.
 */
export function safetyCitations(safety: SafetyResult): Citation[] {
  return safety.flags.flatMap((flag) =>
    flag.matches.map(
      (match): Citation => ({
        pageNumber: flag.pageNumber,
        evidenceType: 'safety_violation',
        evidenceText: match.context,
        relevance: `Safety flag (${flag.category}): ${flag.description}`,
        relevanceScore: flag.confidence,
        safetyCategory: flag.category,
      })
    )
  )
}

/**
 * Model citations first, then PII citations in detection order,
 * then safety citations in flag order.
 */
export function mergeCitations(
  modelCitations: readonly Citation[],
  pii: PiiResult,
  safety: SafetyResult
): Citation[] {
  return [...modelCitations, ...piiCitations(pii), ...safetyCitations(safety)]
}
