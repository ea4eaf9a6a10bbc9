export { ContentSafetyChecker, buildSafetyResult, shouldBlock } from './checker.js'
export {
  SafetyTaxonomySchema,
  DEFAULT_TAXONOMY_PATH,
  loadSafetyTaxonomy,
  getDefaultTaxonomy,
} from './taxonomy.js'
export {
  SAFETY_CATEGORIES,
  type SafetyCategory,
  type FlagSeverity,
  type SafetyMatch,
  type SafetyFlag,
  type SafetyResult,
  type SafetyCategoryDefinition,
  type SafetyTaxonomy,
  type ContentSafetyCheckerOptions,
} from './types.js'
