export {
  ClassificationPipeline,
  BLOCKED_REASONING,
  BLOCKED_SUMMARY,
} from './orchestrator.js'
export {
  createClassificationPipeline,
  createAuditLogger,
  type PipelineOverrides,
} from './factory.js'
export type {
  ClassificationOutcome,
  ClassificationStatus,
  CompletedOutcome,
  BlockedOutcome,
  FailedOutcome,
  FailureCode,
  ModelsUsed,
  ClassifyOptions,
  PipelineDependencies,
} from './types.js'
