import { matchCategory } from '../classification/categories.js'
import { UNKNOWN_CATEGORY, type ResultCategory } from '../classification/types.js'
import { ConfigError } from '../config/errors.js'
import type { CompiledRule, ComparisonOperator, ConditionClause, HitlRule } from './types.js'

/**
 * The three standard escalation rules.
 */
export const STANDARD_HITL_RULES: HitlRule[] = [
  {
    condition: 'confidence_score < 0.7',
    reason: 'Classification confidence is below the review threshold',
  },
  {
    condition: 'pii_detected AND category == public_indicators',
    reason: 'PII found in a document classified as Public',
  },
  {
    condition: 'safety_flags_present',
    reason: 'Content safety flags require human review',
  },
]

/**
 * Always evaluated: unparseable model output escalates.
 */
export const UNKNOWN_CATEGORY_RULE: HitlRule = {
  condition: `category == ${UNKNOWN_CATEGORY}`,
  reason: 'Model output could not be mapped to a classification category',
}

const COMPARISON_OPERATORS: Record<string, ComparisonOperator> = {
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
}

const CONFIDENCE_CLAUSE = /^confidence(?:_score)?\s*(<=|>=|<|>)\s*(-?\d+(?:\.\d+)?)$/i
const FLAG_CLAUSE = /^(pii_detected|safety_flags_present)$/i
const CATEGORY_CLAUSE = /^category\s*(==|!=)\s*['"]?([^'"]+?)['"]?$/i

/**
 * Category names accepted in conditions besides the category names themselves.
 */
const CATEGORY_ALIASES: Record<string, ResultCategory> = {
  public_indicators: 'Public',
  unknown: UNKNOWN_CATEGORY,
}

function parseCategoryName(name: string, condition: string): ResultCategory {
  const alias = CATEGORY_ALIASES[name.trim().toLowerCase()]
  if (alias) return alias

  const category = matchCategory(name)
  if (!category) {
    throw new ConfigError(
      `Unknown category '${name}' in HITL condition '${condition}'`,
      'hitl.rules',
      condition
    )
  }
  return category
}

function parseClause(clause: string, condition: string): ConditionClause {
  const confidence = CONFIDENCE_CLAUSE.exec(clause)
  if (confidence) {
    return {
      kind: 'confidence',
      operator: COMPARISON_OPERATORS[confidence[1]],
      threshold: Number(confidence[2]),
    }
  }

  const flag = FLAG_CLAUSE.exec(clause)
  if (flag) {
    return {
      kind: 'flag',
      flag: flag[1].toLowerCase() === 'pii_detected' ? 'pii_detected' : 'safety_flags_present',
    }
  }

  const category = CATEGORY_CLAUSE.exec(clause)
  if (category) {
    return {
      kind: 'category',
      operator: category[1] === '!=' ? '!=' : '==',
      category: parseCategoryName(category[2], condition),
    }
  }

  throw new ConfigError(`Unsupported HITL condition '${condition}'`, 'hitl.rules', condition)
}

/**
 * Parse a rule's condition into a conjunction of clauses.
 * Throws ConfigError when any clause is not one of the supported shapes.
 */
export function compileRule(rule: HitlRule): CompiledRule {
  const clauses = rule.condition
    .split(/\s+AND\s+/i)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)

  if (clauses.length === 0) {
    throw new ConfigError('Empty HITL condition', 'hitl.rules', rule.condition)
  }

  return {
    condition: rule.condition,
    reason: rule.reason,
    clauses: clauses.map((clause) => parseClause(clause, rule.condition)),
  }
}
