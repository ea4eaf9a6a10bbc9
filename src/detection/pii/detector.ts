import type { Page } from '../../document/types.js'
import { clampScore } from '../severity.js'
import { HIGH_RISK_PII_TYPES, PII_DEFINITIONS } from './patterns.js'
import { maskWindow, redactValue } from './redaction.js'
import type {
  PiiDetection,
  PiiDetectorOptions,
  PiiResult,
  PiiSeverity,
  PiiType,
  PiiTypeDefinition,
} from './types.js'

const BASE_CONFIDENCE = 0.5
const CONTEXT_KEYWORD_BONUS = 0.2
const MEDIUM_SEVERITY_COUNT = 5
// Keywords this short only count as whole words ("tel" is not in "hotel")
const SHORT_KEYWORD_LENGTH = 4

/**
 * Accepted match with its raw span. Internal only: the raw value never
 * leaves the detector.
 */
interface AcceptedMatch {
  type: PiiType
  raw: string
  start: number
  end: number
  context: string
  confidence: number
}

/**
 * A type definition with its patterns and keywords ready to run.
 */
interface CompiledDefinition {
  definition: PiiTypeDefinition
  patterns: RegExp[]
  keywords: RegExp[]
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function compileDefinition(definition: PiiTypeDefinition): CompiledDefinition {
  return {
    definition,
    // `d` exposes the offsets of the `value` group
    patterns: definition.patterns.map((pattern) =>
      pattern.hasIndices ? pattern : new RegExp(pattern.source, pattern.flags + 'd')
    ),
    keywords: definition.contextKeywords.map((keyword) => {
      const escaped = escapeRegExp(keyword)
      return new RegExp(
        keyword.length <= SHORT_KEYWORD_LENGTH ? `\\b${escaped}\\b` : escaped,
        'i'
      )
    }),
  }
}

/**
 * Check if a position is already covered by an accepted span.
 */
function isLocationCovered(matches: AcceptedMatch[], start: number): boolean {
  return matches.some((m) => start >= m.start && start < m.end)
}

/**
 * Severity policy: high-risk types → high, more than five detections → medium,
 * any detection → low.
 */
export function computePiiSeverity(detections: readonly PiiDetection[]): PiiSeverity {
  if (detections.length === 0) return 'none'
  if (detections.some((d) => HIGH_RISK_PII_TYPES.has(d.type))) return 'high'
  if (detections.length > MEDIUM_SEVERITY_COUNT) return 'medium'
  return 'low'
}

/**
 * Build a result from an ordered list of detections.
 */
export function buildPiiResult(detections: PiiDetection[]): PiiResult {
  const types = [...new Set(detections.map((d) => d.type))]
  return {
    detected: detections.length > 0,
    types,
    detections,
    totalDetections: detections.length,
    severity: computePiiSeverity(detections),
  }
}

/**
 * PiiDetector - finds, validates and scores personally identifiable data.
 *
 * Usage:
 *   const detector = new PiiDetector({ confidenceThreshold: 0.6 })
 *   const result = detector.detectAcrossPages(document.pages)
 */
export class PiiDetector {
  private readonly threshold: number
  private readonly contextRadius: number
  private readonly definitions: readonly CompiledDefinition[]

  constructor(
    options: PiiDetectorOptions = {},
    definitions: readonly PiiTypeDefinition[] = PII_DEFINITIONS
  ) {
    this.threshold = options.confidenceThreshold ?? 0.6
    this.contextRadius = options.contextRadius ?? 50
    this.definitions = definitions.map(compileDefinition)
  }

  /**
   * Detect PII in the text of one page.
   * Empty or missing text yields an empty result.
   */
  detect(text: string | null | undefined, pageNumber: number): PiiResult {
    if (!text) {
      return buildPiiResult([])
    }

    const matches = this.scan(text)
    const detections = matches.map(
      (match): PiiDetection => ({
        type: match.type,
        value: redactValue(match.raw),
        // Every accepted span in the window is masked, not only this one
        context: maskWindow(
          text,
          matches,
          Math.max(0, match.start - this.contextRadius),
          Math.min(text.length, match.end + this.contextRadius)
        ),
        position: match.start,
        pageNumber,
        confidence: match.confidence,
      })
    )

    return buildPiiResult(detections)
  }

  /**
   * Detect PII across pages. Detections are concatenated in page order;
   * the severity is recomputed over the full set.
   */
  detectAcrossPages(pages: readonly Pick<Page, 'pageNumber' | 'text'>[]): PiiResult {
    const detections: PiiDetection[] = []
    for (const page of pages) {
      detections.push(...this.detect(page.text, page.pageNumber).detections)
    }
    return buildPiiResult(detections)
  }

  /**
   * Replace every accepted detection in the text with its masked form.
   */
  redact(text: string): string {
    if (!text) return text
    return maskWindow(text, this.scan(text))
  }

  /**
   * Human-readable one-line summary of a result.
   */
  summarize(result: PiiResult): string {
    if (!result.detected) {
      return 'No PII detected'
    }

    return [
      `Detected ${result.totalDetections} PII instances`,
      `Types: ${result.types.join(', ')}`,
      `Severity: ${result.severity}`,
    ].join(' | ')
  }

  /**
   * Find all accepted matches, sorted by position.
   */
  private scan(text: string): AcceptedMatch[] {
    const accepted: AcceptedMatch[] = []

    for (const compiled of this.definitions) {
      const { definition } = compiled
      const ofType: AcceptedMatch[] = []

      for (const pattern of compiled.patterns) {
        for (const match of text.matchAll(pattern)) {
          if (!match[0]) continue

          const raw = match.groups?.value ?? match[0]
          const valueSpan = match.indices?.groups?.value
          const start = valueSpan ? valueSpan[0] : match.index ?? 0
          const end = start + raw.length

          // Overlapping patterns of one type report once
          if (isLocationCovered(ofType, start)) continue

          const context = text.slice(
            Math.max(0, start - this.contextRadius),
            Math.min(text.length, end + this.contextRadius)
          )

          const confidence = this.score(compiled, raw, context)
          if (confidence === null || confidence < this.threshold) continue

          ofType.push({ type: definition.type, raw, start, end, context, confidence })
        }
      }

      accepted.push(...ofType)
    }

    // Stable sort keeps type-table order for matches at the same offset
    return accepted.sort((a, b) => a.start - b.start)
  }

  /**
   * Score a candidate. Returns null when structural validation rejects it.
   */
  private score(compiled: CompiledDefinition, value: string, context: string): number | null {
    const { definition } = compiled
    let confidence = BASE_CONFIDENCE

    if (compiled.keywords.some((keyword) => keyword.test(context))) {
      confidence += CONTEXT_KEYWORD_BONUS
    }

    if (definition.validate) {
      if (!definition.validate(value)) {
        return null
      }
      confidence += definition.structuralBonus
    }

    return clampScore(confidence)
  }
}

// Default instance with the standard threshold
export const piiDetector = new PiiDetector()
