export * from './types.js'
export { STANDARD_HITL_RULES, UNKNOWN_CATEGORY_RULE, compileRule } from './rules.js'
export { HitlRuleEngine, computePriority, evaluateHitl } from './engine.js'
