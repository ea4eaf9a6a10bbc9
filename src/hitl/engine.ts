import type { ClassificationResult } from '../classification/types.js'
import type { PiiResult } from '../detection/pii/types.js'
import type { SafetyResult } from '../detection/safety/types.js'
import { STANDARD_HITL_RULES, UNKNOWN_CATEGORY_RULE, compileRule } from './rules.js'
import type {
  CompiledRule,
  ComparisonOperator,
  ConditionClause,
  HitlDecision,
  HitlPriority,
  HitlRule,
  TriggeredRule,
} from './types.js'

type ClassificationState = Pick<ClassificationResult, 'category' | 'confidence'>
type PiiState = Pick<PiiResult, 'detected'>
type SafetyState = Pick<SafetyResult, 'isSafe'>

interface EvaluationState {
  classification: ClassificationState
  pii: PiiState
  safety: SafetyState
}

function compare(value: number, operator: ComparisonOperator, threshold: number): boolean {
  switch (operator) {
    case '<':
      return value < threshold
    case '<=':
      return value <= threshold
    case '>':
      return value > threshold
    case '>=':
      return value >= threshold
  }
}

function clauseHolds(clause: ConditionClause, state: EvaluationState): boolean {
  switch (clause.kind) {
    case 'confidence':
      return compare(state.classification.confidence, clause.operator, clause.threshold)
    case 'flag':
      return clause.flag === 'pii_detected' ? state.pii.detected : !state.safety.isSafe
    case 'category': {
      const equal = state.classification.category === clause.category
      return clause.operator === '==' ? equal : !equal
    }
  }
}

function isUnknownCategoryRule(rule: CompiledRule): boolean {
  return (
    rule.clauses.length === 1 &&
    rule.clauses[0].kind === 'category' &&
    rule.clauses[0].operator === '==' &&
    rule.clauses[0].category === 'Unknown'
  )
}

/**
 * Priority depends only on which detectors fired.
 */
export function computePriority(pii: PiiState, safety: SafetyState): HitlPriority {
  if (!safety.isSafe) return 'high'
  if (pii.detected) return 'medium'
  return 'low'
}

/**
 * HitlRuleEngine - decides whether a classification needs human review.
 *
 * Rules are compiled once at construction; an unsupported condition throws
 * ConfigError there rather than at evaluation time. A rule escalating the
 * Unknown category is always present.
 */
export class HitlRuleEngine {
  private readonly rules: CompiledRule[]

  constructor(rules: readonly HitlRule[] = STANDARD_HITL_RULES) {
    this.rules = rules.map(compileRule)
    if (!this.rules.some(isUnknownCategoryRule)) {
      this.rules.push(compileRule(UNKNOWN_CATEGORY_RULE))
    }
  }

  /**
   * Conditions in evaluation order.
   */
  getRules(): readonly CompiledRule[] {
    return this.rules
  }

  /**
   * Evaluate every rule; each one that matches is reported in rule order.
   */
  evaluate(
    classification: ClassificationState,
    pii: PiiState,
    safety: SafetyState
  ): HitlDecision {
    const state: EvaluationState = { classification, pii, safety }
    const triggers: TriggeredRule[] = []

    for (const rule of this.rules) {
      if (!rule.clauses.every((clause) => clauseHolds(clause, state))) continue

      const trigger: TriggeredRule = { condition: rule.condition, reason: rule.reason }
      if (rule.clauses.some((clause) => clause.kind === 'confidence')) {
        trigger.value = classification.confidence
      }
      triggers.push(trigger)
    }

    return {
      requiresReview: triggers.length > 0,
      triggers,
      priority: computePriority(pii, safety),
    }
  }
}

/**
 * Evaluate a rule list against classification, PII and safety state.
 */
export function evaluateHitl(
  classification: ClassificationState,
  pii: PiiState,
  safety: SafetyState,
  rules: readonly HitlRule[]
): HitlDecision {
  return new HitlRuleEngine(rules).evaluate(classification, pii, safety)
}
