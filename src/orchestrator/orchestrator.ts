import { randomUUID } from 'crypto'
import type { AuditOptions } from '../audit/service.js'
import { sanitizeErrorMessage } from '../audit/redaction.js'
import { computeAgreement } from '../classification/agreement.js'
import { mergeCitations } from '../classification/citations.js'
import { parseClassificationResponse } from '../classification/parse.js'
import type { ClassificationResult } from '../classification/types.js'
import { ConfigError } from '../config/errors.js'
import type { PipelineConfig } from '../config/pipeline.js'
import { PiiDetector } from '../detection/pii/detector.js'
import type { PiiResult } from '../detection/pii/types.js'
import { ContentSafetyChecker, shouldBlock } from '../detection/safety/checker.js'
import type { SafetyResult } from '../detection/safety/types.js'
import { normalizeDocumentContent } from '../document/schema.js'
import { assembleDocumentText, extractDocumentMetadata } from '../document/text.js'
import type { DocumentContent, DocumentMetadata } from '../document/types.js'
import { HitlRuleEngine } from '../hitl/engine.js'
import type { InvokeResult, ModelRef } from '../provider/gateway.js'
import { ProviderError } from '../provider/types.js'
import type {
  BlockedOutcome,
  ClassificationOutcome,
  ClassifyOptions,
  FailedOutcome,
  FailureCode,
  PipelineDependencies,
} from './types.js'

export const BLOCKED_REASONING = 'Document blocked due to critical safety violations'
export const BLOCKED_SUMMARY = 'Unsafe content detected'

type ModelRole = 'primary' | 'secondary'

/**
 * State of one classify() call.
 */
interface RunContext {
  documentId: string
  startedAt: number
  signal?: AbortSignal
}

/**
 * ClassificationPipeline - decides the sensitivity category of a document.
 *
 * Steps run strictly in order:
 * 1. PII detection and content safety over every page
 * 2. Block unsafe content without calling any model
 * 3. Primary model classification
 * 4. Optional verification by the secondary model
 * 5. Agreement score
 * 6. Citation merge
 * 7. HITL evaluation
 *
 * classify() never rejects. Any error ends the run as a `failed` outcome
 * with no partial results.
 */
export class ClassificationPipeline {
  private readonly deps: PipelineDependencies
  private readonly config: PipelineConfig
  private readonly piiDetector: PiiDetector
  private readonly safetyChecker: ContentSafetyChecker
  private readonly hitlEngine: HitlRuleEngine

  constructor(deps: PipelineDependencies, config: PipelineConfig) {
    this.deps = deps
    this.config = config

    this.piiDetector =
      deps.piiDetector ??
      new PiiDetector({ confidenceThreshold: config.piiConfidenceThreshold })
    this.safetyChecker =
      deps.safetyChecker ?? new ContentSafetyChecker({ threshold: config.safetyThreshold })
    // Rules compile here; an unsupported condition throws ConfigError
    this.hitlEngine = deps.hitlEngine ?? new HitlRuleEngine(config.hitlRules)

    this.assertServed(config.primaryModel, 'primaryModel')
    if (config.dualVerification) {
      this.assertServed(config.secondaryModel, 'secondaryModel')
    }
  }

  /**
   * Classify one document.
   */
  async classify(
    document: DocumentContent,
    options: ClassifyOptions = {}
  ): Promise<ClassificationOutcome> {
    const run: RunContext = {
      documentId: options.documentId ?? randomUUID(),
      startedAt: Date.now(),
      signal: options.signal,
    }
    const dualVerification = options.dualVerification ?? this.config.dualVerification

    try {
      run.signal?.throwIfAborted()

      const content = normalizeDocumentContent(document)
      const metadata = extractDocumentMetadata(content)

      await this.audit(run, {
        category: 'classification',
        action: 'started',
        metadata: { pageCount: metadata.pageCount, dualVerification },
      })

      if (!content.isLegible) {
        await this.audit(run, {
          category: 'classification',
          action: 'low_legibility',
          severity: 'warning',
          metadata: { legibilityScore: content.legibilityScore },
        })
      }

      // Step 1
      const pii = this.piiDetector.detectAcrossPages(content.pages)
      const safety = this.safetyChecker.checkPages(content.pages)
      await this.audit(run, {
        category: 'detection',
        action: 'completed',
        severity: safety.isSafe ? 'info' : 'warning',
        metadata: {
          pii: this.piiDetector.summarize(pii),
          safety: this.safetyChecker.summarize(safety),
        },
      })

      // Step 2
      if (shouldBlock(safety)) {
        return await this.block(run, pii, safety, metadata)
      }

      const documentText = assembleDocumentText(content)
      const pageNumbers = new Set(content.pages.map((page) => page.pageNumber))

      // Step 3
      const primaryResponse = await this.invokeModel(
        run,
        'primary',
        this.config.primaryModel,
        this.deps.promptBuilder.buildFinalClassificationPrompt(documentText, pii, safety)
      )
      const primary = parseClassificationResponse(primaryResponse.text, { pageNumbers })
      if (!primary.structured) {
        await this.audit(run, {
          category: 'classification',
          action: 'unstructured_response',
          severity: 'warning',
          metadata: { role: 'primary' },
        })
      }

      // Steps 4-5
      let classification: ClassificationResult = primary
      if (dualVerification) {
        const secondaryResponse = await this.invokeModel(
          run,
          'secondary',
          this.config.secondaryModel,
          this.deps.promptBuilder.buildVerificationPrompt(documentText, primary)
        )
        const secondary = parseClassificationResponse(secondaryResponse.text, { pageNumbers })
        const agreementScore = computeAgreement(primary, secondary)

        classification = {
          ...classification,
          verification: { verified: true, agreementScore, secondary },
        }
        await this.audit(run, {
          category: 'classification',
          action: 'verified',
          metadata: {
            primaryCategory: primary.category,
            secondaryCategory: secondary.category,
            agreementScore,
          },
        })
      }

      // Step 6
      classification = {
        ...classification,
        citations: mergeCitations(primary.citations, pii, safety),
      }

      // Step 7
      const hitl = this.hitlEngine.evaluate(classification, pii, safety)
      await this.audit(run, {
        category: 'hitl',
        action: hitl.requiresReview ? 'review_required' : 'no_review',
        severity: hitl.requiresReview ? 'warning' : 'info',
        metadata: {
          priority: hitl.priority,
          triggers: hitl.triggers.map((trigger) => trigger.condition),
        },
      })

      const processingTimeMs = Date.now() - run.startedAt
      await this.audit(run, {
        category: 'classification',
        action: 'completed',
        metadata: {
          category: classification.category,
          confidence: classification.confidence,
          citations: classification.citations.length,
          processingTimeMs,
        },
      })

      return {
        status: 'completed',
        documentId: run.documentId,
        processingTimeMs,
        classification,
        pii,
        safety,
        hitl,
        document: metadata,
        models: dualVerification
          ? { primary: this.config.primaryModel.model, secondary: this.config.secondaryModel.model }
          : { primary: this.config.primaryModel.model },
      }
    } catch (error) {
      return this.fail(run, error)
    }
  }

  private async block(
    run: RunContext,
    pii: PiiResult,
    safety: SafetyResult,
    document: DocumentMetadata
  ): Promise<BlockedOutcome> {
    await this.audit(run, {
      category: 'classification',
      action: 'blocked',
      severity: 'alert',
      metadata: {
        overallSeverity: safety.overallSeverity,
        categories: safety.categoriesFlagged,
      },
    })

    return {
      status: 'blocked',
      documentId: run.documentId,
      processingTimeMs: Date.now() - run.startedAt,
      classification: {
        category: 'Unsafe',
        confidence: 1,
        reasoning: BLOCKED_REASONING,
        summary: BLOCKED_SUMMARY,
        citations: mergeCitations([], pii, safety),
        secondaryCategories: [],
        structured: true,
      },
      pii,
      safety,
      document,
    }
  }

  /**
   * One gateway call. Abort is checked before and after; the signal is
   * also forwarded so the provider can drop the request.
   */
  private async invokeModel(
    run: RunContext,
    role: ModelRole,
    model: ModelRef,
    prompt: string
  ): Promise<InvokeResult> {
    run.signal?.throwIfAborted()

    const startedAt = Date.now()
    let result: InvokeResult
    try {
      result = await this.deps.gateway.invoke({
        model,
        prompt,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
        signal: run.signal,
      })
    } catch (error) {
      await this.audit(run, {
        category: 'provider',
        action: 'invoke_failed',
        severity: 'warning',
        metadata: {
          role,
          provider: model.provider,
          model: model.model,
          errorMessage: error instanceof Error ? error.message : String(error),
        },
      })
      throw error
    }

    run.signal?.throwIfAborted()

    await this.audit(run, {
      category: 'provider',
      action: 'invoked',
      metadata: {
        role,
        provider: result.provider,
        model: result.model,
        stopReason: result.stopReason,
        usage: result.usage,
        durationMs: Date.now() - startedAt,
      },
    })
    return result
  }

  private async fail(run: RunContext, error: unknown): Promise<FailedOutcome> {
    const code = this.failureCode(run, error)
    const message =
      code === 'aborted'
        ? 'Classification aborted'
        : sanitizeErrorMessage(error instanceof Error ? error.message : String(error))

    await this.audit(run, {
      category: 'classification',
      action: 'failed',
      severity: 'alert',
      metadata: { code, errorMessage: message },
    })

    return {
      status: 'failed',
      documentId: run.documentId,
      processingTimeMs: Date.now() - run.startedAt,
      code,
      error: message,
    }
  }

  private failureCode(run: RunContext, error: unknown): FailureCode {
    if (run.signal?.aborted) return 'aborted'
    if (error instanceof ConfigError) return 'config_error'
    if (error instanceof ProviderError) return error.code
    return 'internal_error'
  }

  private assertServed(model: ModelRef, field: string): void {
    if (!this.deps.gateway.supports(model)) {
      throw new ConfigError(
        `Model '${model.model}' needs provider '${model.provider}', which is not configured`,
        field,
        model
      )
    }
  }

  private audit(run: RunContext, options: AuditOptions): Promise<void> {
    return this.deps.auditLogger.log({ ...options, documentId: run.documentId })
  }
}
