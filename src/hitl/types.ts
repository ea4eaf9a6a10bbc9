import type { ResultCategory } from '../classification/types.js'

/**
 * Declarative escalation rule, supplied as configuration.
 */
export interface HitlRule {
  /** Condition text, e.g. "confidence_score < 0.7" */
  condition: string
  /** Why a match needs human review */
  reason: string
}

export type ComparisonOperator = '<' | '<=' | '>' | '>='

/**
 * One clause of a compiled condition. A condition is a conjunction of clauses.
 */
export type ConditionClause =
  | { kind: 'confidence'; operator: ComparisonOperator; threshold: number }
  | { kind: 'flag'; flag: 'pii_detected' | 'safety_flags_present' }
  | { kind: 'category'; operator: '==' | '!='; category: ResultCategory }

/**
 * Rule with its condition parsed once.
 */
export interface CompiledRule extends HitlRule {
  clauses: ConditionClause[]
}

/**
 * A rule that matched.
 */
export interface TriggeredRule {
  condition: string
  reason: string
  /** Observed confidence, for rules that compare it */
  value?: number
}

export type HitlPriority = 'high' | 'medium' | 'low'

/**
 * Escalation decision.
 */
export interface HitlDecision {
  requiresReview: boolean
  triggers: TriggeredRule[]
  priority: HitlPriority
}
