import {
  CLASSIFICATION_CATEGORIES,
  UNKNOWN_CATEGORY,
  type ClassificationCategory,
  type ResultCategory,
} from './types.js'

function canonical(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_-]+/g, ' ')
}

const BY_CANONICAL_NAME = new Map<string, ClassificationCategory>(
  CLASSIFICATION_CATEGORIES.map((category) => [canonical(category), category])
)

/**
 * Map a category name to a known category, ignoring case and
 * underscore/space differences. Returns undefined when it matches none.
 */
export function matchCategory(value: string): ClassificationCategory | undefined {
  return BY_CANONICAL_NAME.get(canonical(value))
}

/**
 * Map free text from a model to a category, or the Unknown sentinel.
 */
export function normalizeCategory(value: unknown): ResultCategory {
  if (typeof value !== 'string') return UNKNOWN_CATEGORY
  return matchCategory(value) ?? UNKNOWN_CATEGORY
}
