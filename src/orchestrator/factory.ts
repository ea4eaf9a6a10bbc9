import { AuditLogger } from '../audit/service.js'
import { JsonlAuditStore } from '../audit/store/jsonl.js'
import { MemoryAuditStore } from '../audit/store/memory.js'
import type { CredentialLookupOptions } from '../config/credentials.js'
import { getAuditPath } from '../config/paths.js'
import { toPipelineConfig } from '../config/pipeline.js'
import type { AppConfig } from '../config/schema.js'
import { LibraryPromptBuilder } from '../prompt/builder.js'
import { createProviders } from '../provider/factory.js'
import { ProviderGateway } from '../provider/gateway.js'
import { ClassificationPipeline } from './orchestrator.js'
import type { PipelineDependencies } from './types.js'

export interface PipelineOverrides extends Partial<PipelineDependencies> {
  /** Where API keys are looked up when providers are created */
  credentials?: CredentialLookupOptions
}

/**
 * Build the audit logger the logging config describes.
 */
export function createAuditLogger(config: AppConfig): AuditLogger {
  const store = config.logging.audit.enabled
    ? new JsonlAuditStore(config.logging.audit.directory ?? getAuditPath())
    : new MemoryAuditStore()
  return new AuditLogger(store, { minSeverity: config.logging.level })
}

/**
 * Wire a pipeline from configuration. Anything in overrides replaces the
 * collaborator that would be built from config.
 */
export async function createClassificationPipeline(
  config: AppConfig,
  overrides: PipelineOverrides = {}
): Promise<ClassificationPipeline> {
  const { credentials, ...deps } = overrides

  const gateway = deps.gateway ?? new ProviderGateway(await createProviders(config, credentials))

  return new ClassificationPipeline(
    {
      ...deps,
      gateway,
      promptBuilder: deps.promptBuilder ?? new LibraryPromptBuilder(),
      auditLogger: deps.auditLogger ?? createAuditLogger(config),
    },
    toPipelineConfig(config)
  )
}
