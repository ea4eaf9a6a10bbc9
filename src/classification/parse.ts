import { z } from 'zod'
import { clampScore } from '../detection/severity.js'
import { matchCategory, normalizeCategory } from './categories.js'
import {
  UNKNOWN_CATEGORY,
  type Citation,
  type ClassificationCategory,
  type ClassificationResult,
} from './types.js'

const DEFAULT_CONFIDENCE = 0.5
const DEFAULT_CITATION_SCORE = 0.8
const FALLBACK_SUMMARY = 'Could not parse structured response'

/**
 * Read a score that may arrive as a number or a numeric string.
 */
const ScoreSchema = z
  .union([z.number(), z.string().regex(/^\s*-?\d+(?:\.\d+)?\s*$/).transform(Number)])
  .transform(clampScore)

/**
 * Citation as the response format asks for it. Fields degrade instead of
 * failing; only a citation that is not an object is dropped.
 */
const ModelCitationSchema = z.object({
  page_number: z.number().int().nullish().catch(null),
  evidence_type: z
    .enum(['text', 'image', 'metadata'])
    .catch('text'),
  evidence_text: z.string().catch(''),
  relevance: z.string().catch(''),
  relevance_score: ScoreSchema.optional().catch(undefined),
})

/**
 * Classification response. Every field has a fallback so that a decoded
 * object always produces a result.
 */
const ModelResponseSchema = z.object({
  category: z.unknown().transform(normalizeCategory),
  confidence: ScoreSchema.catch(DEFAULT_CONFIDENCE),
  reasoning: z.string().catch(''),
  summary: z.string().catch(''),
  citations: z.array(z.unknown()).catch([]),
  secondary_categories: z.array(z.unknown()).catch([]),
})

export interface ParseOptions {
  /** Pages that exist in the document; citations elsewhere lose their page */
  pageNumbers?: ReadonlySet<number>
}

/**
 * Extract the JSON candidate from raw model output: the first ```json
 * fenced block, else the first '{' through the last '}', else everything.
 */
export function extractJsonCandidate(raw: string): string {
  const fenced = /```json\s*([\s\S]*?)```/i.exec(raw)
  if (fenced) {
    return fenced[1].trim()
  }

  const start = raw.indexOf('{')
  const end = raw.lastIndexOf('}')
  if (start !== -1 && end > start) {
    return raw.slice(start, end + 1)
  }

  return raw
}

/**
 * Result used whenever model output cannot be decoded.
 */
export function fallbackClassification(raw: string): ClassificationResult {
  return {
    category: UNKNOWN_CATEGORY,
    confidence: DEFAULT_CONFIDENCE,
    reasoning: raw,
    summary: FALLBACK_SUMMARY,
    citations: [],
    secondaryCategories: [],
    structured: false,
  }
}

/**
 * Parse raw model output into a classification. Never throws.
 */
export function parseClassificationResponse(
  raw: string,
  options: ParseOptions = {}
): ClassificationResult {
  let decoded: unknown
  try {
    decoded = JSON.parse(extractJsonCandidate(raw))
  } catch {
    return fallbackClassification(raw)
  }

  const parsed = ModelResponseSchema.safeParse(decoded)
  if (!parsed.success) {
    // Decoded, but not an object
    return fallbackClassification(raw)
  }

  const response = parsed.data
  return {
    category: response.category,
    confidence: response.confidence,
    reasoning: response.reasoning,
    summary: response.summary,
    citations: toCitations(response.citations, options.pageNumbers),
    secondaryCategories: toCategories(response.secondary_categories),
    structured: true,
  }
}

function toCitations(
  items: unknown[],
  pageNumbers: ReadonlySet<number> | undefined
): Citation[] {
  const citations: Citation[] = []

  for (const item of items) {
    const parsed = ModelCitationSchema.safeParse(item)
    if (!parsed.success) continue

    const citation = parsed.data
    const page = citation.page_number ?? null
    citations.push({
      pageNumber: page !== null && pageNumbers && !pageNumbers.has(page) ? null : page,
      evidenceType: citation.evidence_type,
      evidenceText: citation.evidence_text,
      relevance: citation.relevance,
      relevanceScore: citation.relevance_score ?? DEFAULT_CITATION_SCORE,
    })
  }

  return citations
}

function toCategories(items: unknown[]): ClassificationCategory[] {
  const categories: ClassificationCategory[] = []
  for (const item of items) {
    if (typeof item !== 'string') continue
    const category = matchCategory(item)
    if (category && !categories.includes(category)) {
      categories.push(category)
    }
  }
  return categories
}
