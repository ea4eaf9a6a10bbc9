import type { Page } from '../../document/types.js'
import { clampScore, maxSeverity } from '../severity.js'
import { getDefaultTaxonomy } from './taxonomy.js'
import {
  SAFETY_CATEGORIES,
  type ContentSafetyCheckerOptions,
  type SafetyCategory,
  type SafetyCategoryDefinition,
  type SafetyFlag,
  type SafetyMatch,
  type SafetyResult,
  type SafetyTaxonomy,
} from './types.js'

const BASE_CONFIDENCE = 0.8
const SAFE_CONTEXT_CONFIDENCE = 0.4

interface CompiledCategory {
  category: SafetyCategory
  definition: SafetyCategoryDefinition
  matchers: Array<{ keyword: string; pattern: RegExp }>
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Build a result from flags in page order.
 */
export function buildSafetyResult(flags: SafetyFlag[]): SafetyResult {
  return {
    isSafe: flags.length === 0,
    totalFlags: flags.length,
    flags,
    overallSeverity: maxSeverity(flags.map((f) => f.severity)),
    requiresReview: flags.length > 0,
    categoriesFlagged: [...new Set(flags.map((f) => f.category))],
  }
}

/**
 * Blocking policy: unsafe with critical or high overall severity.
 * This is the only decision that short-circuits classification.
 */
export function shouldBlock(result: SafetyResult): boolean {
  if (result.isSafe) return false
  return result.overallSeverity === 'critical' || result.overallSeverity === 'high'
}

/**
 * ContentSafetyChecker - flags unsafe content categories by keyword.
 *
 * A category is flagged on a page when any of its keywords occurs (whole
 * words, case-insensitive). Confidence is 0.8, or 0.4 when the page also
 * contains a safe-context indicator such as "education"; the reduction is
 * applied before the threshold test.
 */
export class ContentSafetyChecker {
  private readonly threshold: number
  private readonly contextRadius: number
  private readonly safeContexts: string[]
  private readonly categories: CompiledCategory[]

  constructor(options: ContentSafetyCheckerOptions = {}) {
    const taxonomy: SafetyTaxonomy = options.taxonomy ?? getDefaultTaxonomy()

    this.threshold = options.threshold ?? 0.5
    this.contextRadius = options.contextRadius ?? 50
    this.safeContexts = taxonomy.safeContexts.map((ctx) => ctx.toLowerCase())
    this.categories = SAFETY_CATEGORIES.map((category) => {
      const definition = taxonomy.categories[category]
      return {
        category,
        definition,
        matchers: definition.keywords.map((keyword) => ({
          keyword,
          pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'gi'),
        })),
      }
    })
  }

  /**
   * Check the text of one page.
   */
  check(text: string | null | undefined, pageNumber: number): SafetyResult {
    if (!text) {
      return buildSafetyResult([])
    }

    const lowered = text.toLowerCase()
    const isSafeContext = this.safeContexts.some((ctx) => lowered.includes(ctx))
    const confidence = clampScore(isSafeContext ? SAFE_CONTEXT_CONFIDENCE : BASE_CONFIDENCE)

    const flags: SafetyFlag[] = []
    for (const { category, definition, matchers } of this.categories) {
      const matches = this.findMatches(text, matchers)
      if (matches.length === 0) continue
      if (confidence < this.threshold) continue

      flags.push({
        category,
        severity: definition.severity,
        description: definition.description,
        matches,
        pageNumber,
        confidence,
        safeContext: isSafeContext,
      })
    }

    return buildSafetyResult(flags)
  }

  /**
   * Check all pages; flags are concatenated in page order.
   */
  checkPages(pages: readonly Pick<Page, 'pageNumber' | 'text'>[]): SafetyResult {
    const flags: SafetyFlag[] = []
    for (const page of pages) {
      flags.push(...this.check(page.text, page.pageNumber).flags)
    }
    return buildSafetyResult(flags)
  }

  /**
   * See {@link shouldBlock}.
   */
  shouldBlock(result: SafetyResult): boolean {
    return shouldBlock(result)
  }

  /**
   * Human-readable one-line summary of a result.
   */
  summarize(result: SafetyResult): string {
    if (result.isSafe) {
      return 'Content is safe for all audiences'
    }

    return [
      'UNSAFE CONTENT DETECTED',
      `${result.totalFlags} violations`,
      `Categories: ${result.categoriesFlagged.join(', ')}`,
      `Severity: ${result.overallSeverity}`,
    ].join(' | ')
  }

  private findMatches(text: string, matchers: CompiledCategory['matchers']): SafetyMatch[] {
    const matches: SafetyMatch[] = []

    for (const { keyword, pattern } of matchers) {
      for (const match of text.matchAll(pattern)) {
        const position = match.index ?? 0
        const start = Math.max(0, position - this.contextRadius)
        const end = Math.min(text.length, position + match[0].length + this.contextRadius)

        matches.push({
          keyword,
          context: text.slice(start, end).trim(),
          position,
        })
      }
    }

    return matches
  }
}
