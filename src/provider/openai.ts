import { z } from 'zod'
import { postJson } from './http.js'
import type {
  Provider,
  ConversationMessage,
  ProviderRequestOptions,
  ProviderResponse,
  StopReason,
} from './types.js'
import { ProviderError } from './types.js'

/**
 * OpenAI API configuration.
 */
export interface OpenAIConfig {
  apiKey: string
  /** Base URL including the version segment */
  baseUrl?: string
  defaultModel?: string
  /** Used when a request carries no system prompt */
  systemPrompt?: string
  timeout?: number
  maxRetries?: number
}

const ChatCompletionSchema = z.object({
  id: z.string(),
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
})

/**
 * OpenAI Chat Completions provider.
 */
export class OpenAIProvider implements Provider {
  readonly name = 'openai'
  private config: Required<OpenAIConfig>

  constructor(config: OpenAIConfig) {
    this.config = {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl ?? 'https://api.openai.com/v1',
      defaultModel: config.defaultModel ?? 'gpt-3.5-turbo',
      systemPrompt: config.systemPrompt ?? 'You are a document classification expert.',
      timeout: config.timeout ?? 120000,
      maxRetries: config.maxRetries ?? 3,
    }
  }

  isAvailable(): boolean {
    return this.config.apiKey.length > 0
  }

  countTokens(text: string): number {
    return Math.ceil(text.length / 4)
  }

  async createMessage(
    messages: ConversationMessage[],
    options: ProviderRequestOptions
  ): Promise<ProviderResponse> {
    const body: Record<string, unknown> = {
      model: options.model || this.config.defaultModel,
      messages: [
        { role: 'system', content: options.system ?? this.config.systemPrompt },
        ...messages.map((m) => ({ role: m.role, content: m.content })),
      ],
      max_tokens: options.maxTokens ?? 4096,
    }
    if (options.temperature !== undefined) {
      body.temperature = options.temperature
    }

    const data = await postJson(
      {
        baseUrl: this.config.baseUrl,
        timeout: this.config.timeout,
        maxRetries: this.config.maxRetries,
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
      },
      '/chat/completions',
      body,
      options.signal
    )

    const parsed = ChatCompletionSchema.safeParse(data)
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected OpenAI response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        'api_error'
      )
    }

    const [choice] = parsed.data.choices
    return {
      id: parsed.data.id,
      model: parsed.data.model,
      text: choice.message.content ?? '',
      stopReason: this.parseFinishReason(choice.finish_reason),
      usage: {
        inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
        outputTokens: parsed.data.usage?.completion_tokens ?? 0,
      },
    }
  }

  private parseFinishReason(reason: string | null | undefined): StopReason {
    switch (reason) {
      case 'length':
        return 'max_tokens'
      default:
        return 'end_turn'
    }
  }
}
