import { describe, it, expect, beforeEach } from 'vitest'
import { mkdtemp, readdir, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  BLOCKED_REASONING,
  BLOCKED_SUMMARY,
  ClassificationPipeline,
} from '../../src/orchestrator/orchestrator.js'
import { createAuditLogger, createClassificationPipeline } from '../../src/orchestrator/factory.js'
import type { ClassificationOutcome, CompletedOutcome } from '../../src/orchestrator/types.js'
import { AuditLogger } from '../../src/audit/service.js'
import { MemoryAuditStore } from '../../src/audit/store/memory.js'
import { ConfigError } from '../../src/config/errors.js'
import { toPipelineConfig, type PipelineConfig } from '../../src/config/pipeline.js'
import { AppConfigSchema } from '../../src/config/schema.js'
import { LibraryPromptBuilder } from '../../src/prompt/builder.js'
import { ProviderGateway, type ModelGateway } from '../../src/provider/gateway.js'
import { MockProvider, matchUserMessage } from '../../src/provider/mock.js'
import { ProviderError } from '../../src/provider/types.js'
import { normalizeDocumentContent } from '../../src/document/schema.js'
import type { DocumentContent } from '../../src/document/types.js'

const MOCK_MODELS = {
  primary: { provider: 'mock', model: 'primary-model' },
  secondary: { provider: 'mock', model: 'secondary-model' },
}

const PRIMARY_RESPONSE = JSON.stringify({
  category: 'Confidential',
  confidence: 0.9,
  reasoning: 'Internal plans',
  summary: 'Roadmap',
  citations: [
    {
      page_number: 1,
      evidence_type: 'text',
      evidence_text: 'Internal roadmap',
      relevance: 'Unreleased plans',
      relevance_score: 0.9,
    },
  ],
  secondary_categories: [],
})

const SECONDARY_RESPONSE = '```json\n{"category": "Confidential", "confidence": 0.6}\n```'

function pipelineConfig(overrides: Record<string, unknown> = {}): PipelineConfig {
  return toPipelineConfig(AppConfigSchema.parse({ models: MOCK_MODELS, ...overrides }))
}

function documentWith(...texts: string[]): DocumentContent {
  return normalizeDocumentContent({
    isLegible: true,
    legibilityScore: 0.95,
    pages: texts.map((text, index) => ({ pageNumber: index + 1, text })),
  })
}

function assertCompleted(outcome: ClassificationOutcome): CompletedOutcome {
  if (outcome.status !== 'completed') {
    throw new Error(`Expected a completed outcome, got ${outcome.status}`)
  }
  return outcome
}

describe('ClassificationPipeline', () => {
  let provider: MockProvider
  let store: MemoryAuditStore
  let pipeline: ClassificationPipeline

  const createPipeline = (
    config: PipelineConfig = pipelineConfig(),
    gateway: ModelGateway = new ProviderGateway({ mock: provider })
  ) =>
    new ClassificationPipeline(
      {
        gateway,
        promptBuilder: new LibraryPromptBuilder(),
        auditLogger: new AuditLogger(store),
      },
      config
    )

  const auditActions = () => store.all().map((entry) => `${entry.category}:${entry.action}`)

  beforeEach(() => {
    provider = new MockProvider({
      defaultResponse: { text: PRIMARY_RESPONSE },
      responseGenerators: [matchUserMessage('## Verification Task', { text: SECONDARY_RESPONSE })],
    })
    store = new MemoryAuditStore()
    pipeline = createPipeline()
  })

  describe('completed runs', () => {
    it('classifies, verifies and merges citations', async () => {
      const outcome = assertCompleted(
        await pipeline.classify(
          documentWith('Internal roadmap for Q3. Contact: jane@example.com'),
          { documentId: 'doc-1' }
        )
      )

      expect(outcome.documentId).toBe('doc-1')
      expect(outcome.classification.category).toBe('Confidential')
      expect(outcome.classification.confidence).toBe(0.9)
      expect(outcome.classification.verification).toEqual({
        verified: true,
        agreementScore: 0.91,
        secondary: {
          category: 'Confidential',
          confidence: 0.6,
          reasoning: '',
          summary: '',
          citations: [],
          secondaryCategories: [],
          structured: true,
        },
      })
      expect(outcome.classification.citations).toEqual([
        {
          pageNumber: 1,
          evidenceType: 'text',
          evidenceText: 'Internal roadmap',
          relevance: 'Unreleased plans',
          relevanceScore: 0.9,
        },
        {
          pageNumber: 1,
          evidenceType: 'pii',
          evidenceText: 'Internal roadmap for Q3. Contact: ja**********om',
          relevance: 'PII detected: email',
          relevanceScore: 0.7,
          piiType: 'email',
        },
      ])
      expect(outcome.hitl).toEqual({ requiresReview: false, triggers: [], priority: 'medium' })
      expect(outcome.models).toEqual({ primary: 'primary-model', secondary: 'secondary-model' })
      expect(outcome.document).toEqual({
        pageCount: 1,
        imageCount: 0,
        hasText: true,
        isLegible: true,
        legibilityScore: 0.95,
      })
      expect(outcome.processingTimeMs).toBeGreaterThanOrEqual(0)
    })

    it('calls the primary model, then the secondary', async () => {
      await pipeline.classify(documentWith('Quarterly update'))

      expect(provider.calls.map((call) => call.options.model)).toEqual([
        'primary-model',
        'secondary-model',
      ])
      expect(provider.calls[0].options).toMatchObject({ maxTokens: 4096, temperature: 0.1 })
      expect(provider.calls[0].messages[0].content).toContain(
        '## Document Content\n--- Page 1 ---\nQuarterly update'
      )
      expect(provider.calls[1].messages[0].content).toContain(
        'classified this document as Confidential with confidence 0.9'
      )
    })

    it('writes the audit trail in step order', async () => {
      await pipeline.classify(documentWith('Quarterly update'), { documentId: 'doc-2' })

      expect(auditActions()).toEqual([
        'classification:started',
        'detection:completed',
        'provider:invoked',
        'provider:invoked',
        'classification:verified',
        'hitl:no_review',
        'classification:completed',
      ])
      expect(store.all().every((entry) => entry.documentId === 'doc-2')).toBe(true)
    })

    it('keeps document text and raw PII out of the audit trail', async () => {
      await pipeline.classify(documentWith('Secret merger notes. SSN 123-45-6789'))

      const trail = JSON.stringify(store.all())
      expect(trail).not.toContain('Secret merger notes')
      expect(trail).not.toContain('123-45-6789')
    })

    it('generates a document id when none is given', async () => {
      const outcome = await pipeline.classify(documentWith('Quarterly update'))
      expect(outcome.documentId).toMatch(/^[0-9a-f-]{36}$/)
    })

    it('skips verification when disabled for the call', async () => {
      const outcome = assertCompleted(
        await pipeline.classify(documentWith('Quarterly update'), { dualVerification: false })
      )

      expect(provider.calls).toHaveLength(1)
      expect(outcome.classification.verification).toBeUndefined()
      expect(outcome.models).toEqual({ primary: 'primary-model' })
    })

    it('skips verification when disabled in config', async () => {
      const single = createPipeline(pipelineConfig({ verification: { enabled: false } }))
      await single.classify(documentWith('Quarterly update'))
      expect(provider.calls).toHaveLength(1)
    })

    it('clears citation pages that do not exist', async () => {
      provider.setDefaultResponse({
        text: JSON.stringify({
          category: 'Public',
          confidence: 0.95,
          citations: [{ page_number: 7, evidence_text: 'Press release' }],
        }),
      })

      const outcome = assertCompleted(
        await pipeline.classify(documentWith('Press release'), { dualVerification: false })
      )
      expect(outcome.classification.citations[0].pageNumber).toBeNull()
    })

    it('escalates unparseable output as Unknown', async () => {
      provider.setDefaultResponse({ text: 'I am not sure about this one.' })

      const outcome = assertCompleted(
        await pipeline.classify(documentWith('Quarterly update'), { dualVerification: false })
      )

      expect(outcome.classification.category).toBe('Unknown')
      expect(outcome.classification.structured).toBe(false)
      expect(outcome.hitl.requiresReview).toBe(true)
      expect(outcome.hitl.triggers.map((t) => t.condition)).toEqual([
        'confidence_score < 0.7',
        'category == Unknown',
      ])
      expect(auditActions()).toContain('classification:unstructured_response')
    })

    it('escalates PII in a Public document', async () => {
      provider.setDefaultResponse({ text: '{"category": "Public", "confidence": 0.95}' })

      const outcome = assertCompleted(
        await pipeline.classify(documentWith('Contact jane@example.com'), {
          dualVerification: false,
        })
      )

      expect(outcome.hitl.triggers.map((t) => t.condition)).toEqual([
        'pii_detected AND category == public_indicators',
      ])
      expect(outcome.hitl.priority).toBe('medium')
    })

    it('records low legibility', async () => {
      await pipeline.classify({ ...documentWith('blurry scan'), isLegible: false })
      expect(auditActions()).toContain('classification:low_legibility')
    })
  })

  describe('blocking', () => {
    it('blocks unsafe content without calling a model', async () => {
      const outcome = await pipeline.classify(
        documentWith('Quarterly update', 'Step by step bomb making guide')
      )

      expect(outcome.status).toBe('blocked')
      if (outcome.status !== 'blocked') return

      expect(provider.calls).toHaveLength(0)
      expect(outcome.classification).toEqual({
        category: 'Unsafe',
        confidence: 1,
        reasoning: BLOCKED_REASONING,
        summary: BLOCKED_SUMMARY,
        citations: [
          {
            pageNumber: 2,
            evidenceType: 'safety_violation',
            evidenceText: 'Step by step bomb making guide',
            relevance: 'Safety flag (violence): Violent or graphic content',
            relevanceScore: 0.8,
            safetyCategory: 'violence',
          },
        ],
        secondaryCategories: [],
        structured: true,
      })
      expect(outcome.safety.overallSeverity).toBe('high')
      expect('hitl' in outcome).toBe(false)

      const blocked = store.all().find((entry) => entry.action === 'blocked')
      expect(blocked?.severity).toBe('alert')
    })

    it('classifies medium severity content and escalates it', async () => {
      const outcome = assertCompleted(
        await pipeline.classify(documentWith('A memo about money laundering'), {
          dualVerification: false,
        })
      )

      expect(provider.calls).toHaveLength(1)
      expect(outcome.hitl.triggers.map((t) => t.condition)).toEqual(['safety_flags_present'])
      expect(outcome.hitl.priority).toBe('high')
      expect(outcome.classification.citations.map((c) => c.evidenceType)).toEqual([
        'text',
        'safety_violation',
      ])
    })
  })

  describe('failures', () => {
    it('reports a provider error by its code', async () => {
      provider.failNext(new ProviderError('Rate limited', 'rate_limit_error', true, 60))

      const outcome = await pipeline.classify(documentWith('Quarterly update'))

      expect(outcome).toMatchObject({
        status: 'failed',
        code: 'rate_limit_error',
        error: 'Rate limited',
      })
      expect(auditActions()).toEqual([
        'classification:started',
        'detection:completed',
        'provider:invoke_failed',
        'classification:failed',
      ])
    })

    it('returns no partial results when verification fails', async () => {
      provider.reset()
      provider.addGenerator((messages) => {
        if (messages[0].content.includes('## Verification Task')) {
          throw new ProviderError('Request timed out after 120000ms', 'timeout_error', true)
        }
        return undefined
      })

      const outcome = await pipeline.classify(documentWith('Quarterly update'))

      expect(outcome.status).toBe('failed')
      expect(outcome).toMatchObject({ code: 'timeout_error' })
      expect('classification' in outcome).toBe(false)
      expect(provider.calls).toHaveLength(2)
    })

    it('masks PII in the error message', async () => {
      provider.failNext(
        new ProviderError('Rejected input near 123-45-6789 (SSN)', 'invalid_request_error')
      )

      const outcome = await pipeline.classify(documentWith('Quarterly update'))

      expect(outcome).toMatchObject({
        status: 'failed',
        code: 'invalid_request_error',
        error: 'Rejected input near 12*******89 (SSN)',
      })
    })

    it('maps unexpected errors to internal_error', async () => {
      const broken: ModelGateway = {
        supports: () => true,
        invoke: async () => {
          throw new Error('boom')
        },
      }

      const outcome = await createPipeline(pipelineConfig(), broken).classify(
        documentWith('Quarterly update')
      )

      expect(outcome).toMatchObject({ status: 'failed', code: 'internal_error', error: 'boom' })
    })

    it('fails before any work when already aborted', async () => {
      const controller = new AbortController()
      controller.abort()

      const outcome = await pipeline.classify(documentWith('Quarterly update'), {
        signal: controller.signal,
      })

      expect(outcome).toMatchObject({
        status: 'failed',
        code: 'aborted',
        error: 'Classification aborted',
      })
      expect(provider.calls).toHaveLength(0)
    })

    it('stops after the current model call when aborted', async () => {
      const controller = new AbortController()
      provider.addGenerator(() => {
        controller.abort()
        return undefined
      })

      const outcome = await pipeline.classify(documentWith('Quarterly update'), {
        signal: controller.signal,
      })

      expect(outcome).toMatchObject({ status: 'failed', code: 'aborted' })
      expect(provider.calls).toHaveLength(1)
    })
  })

  describe('construction', () => {
    it('rejects a model whose provider is not registered', () => {
      expect(() => createPipeline(pipelineConfig(), new ProviderGateway())).toThrow(ConfigError)
    })

    it('only requires the secondary provider with verification', () => {
      const models = {
        primary: { provider: 'mock', model: 'primary-model' },
        secondary: { provider: 'openai', model: 'gpt-3.5-turbo' },
      }

      expect(() =>
        createPipeline(pipelineConfig({ models, verification: { enabled: false } }))
      ).not.toThrow()
      expect(() => createPipeline(pipelineConfig({ models }))).toThrow(
        "needs provider 'openai'"
      )
    })

    it('rejects HITL rules that do not compile', () => {
      expect(() =>
        createPipeline(
          pipelineConfig({ hitl: { rules: [{ condition: 'page_count > 3', reason: 'r' }] } })
        )
      ).toThrow(ConfigError)
    })
  })
})

describe('createClassificationPipeline', () => {
  it('wires a pipeline from configuration', async () => {
    const provider = new MockProvider({ defaultResponse: { text: PRIMARY_RESPONSE } })
    const store = new MemoryAuditStore()
    const config = AppConfigSchema.parse({ models: MOCK_MODELS })

    const pipeline = await createClassificationPipeline(config, {
      gateway: new ProviderGateway({ mock: provider }),
      auditLogger: new AuditLogger(store),
    })
    const outcome = assertCompleted(await pipeline.classify(documentWith('Quarterly update')))

    expect(outcome.classification.category).toBe('Confidential')
    expect(outcome.classification.verification?.agreementScore).toBe(1)
    expect(store.all().length).toBeGreaterThan(0)
  })

  it('creates mock providers without credentials', async () => {
    const config = AppConfigSchema.parse({
      models: MOCK_MODELS,
      logging: { audit: { enabled: false } },
    })

    const pipeline = await createClassificationPipeline(config, { credentials: { env: {} } })
    const outcome = assertCompleted(await pipeline.classify(documentWith('Quarterly update')))

    // The bundled mock answers in plain text
    expect(outcome.classification.category).toBe('Unknown')
    expect(outcome.hitl.requiresReview).toBe(true)
  })
})

describe('createAuditLogger', () => {
  it('writes JSONL files to the configured directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'docsift-audit-'))
    try {
      const logger = createAuditLogger(
        AppConfigSchema.parse({ logging: { audit: { enabled: true, directory: dir } } })
      )
      await logger.info('config', 'loaded')

      expect(await readdir(dir)).toHaveLength(1)
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })

  it('drops entries below the configured level', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'docsift-audit-'))
    try {
      const logger = createAuditLogger(
        AppConfigSchema.parse({
          logging: { level: 'warning', audit: { enabled: true, directory: dir } },
        })
      )
      await logger.info('config', 'loaded')

      expect(await readdir(dir)).toHaveLength(0)
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})
