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
 * Anthropic API configuration.
 */
export interface AnthropicConfig {
  /** API key */
  apiKey: string
  /** Base URL (defaults to https://api.anthropic.com) */
  baseUrl?: string
  /** API version header */
  apiVersion?: string
  /** Default model */
  defaultModel?: string
  /** Request timeout in ms */
  timeout?: number
  /** Max retries */
  maxRetries?: number
}

const MessagesResponseSchema = z.object({
  id: z.string(),
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullish(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
})

type MessagesResponse = z.infer<typeof MessagesResponseSchema>

/**
 * Anthropic Messages API provider.
 */
export class AnthropicProvider implements Provider {
  readonly name = 'anthropic'
  private config: Required<AnthropicConfig>

  constructor(config: AnthropicConfig) {
    this.config = {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl ?? 'https://api.anthropic.com',
      apiVersion: config.apiVersion ?? '2023-06-01',
      defaultModel: config.defaultModel ?? 'claude-3-haiku-20240307',
      timeout: config.timeout ?? 120000,
      maxRetries: config.maxRetries ?? 3,
    }
  }

  /**
   * Check if provider is available.
   */
  isAvailable(): boolean {
    return this.config.apiKey.length > 0
  }

  /**
   * Count tokens (rough approximation).
   */
  countTokens(text: string): number {
    // ~4 chars per token for English
    return Math.ceil(text.length / 4)
  }

  /**
   * Create a message.
   */
  async createMessage(
    messages: ConversationMessage[],
    options: ProviderRequestOptions
  ): Promise<ProviderResponse> {
    const data = await postJson(
      {
        baseUrl: this.config.baseUrl,
        timeout: this.config.timeout,
        maxRetries: this.config.maxRetries,
        headers: {
          'x-api-key': this.config.apiKey,
          'anthropic-version': this.config.apiVersion,
        },
      },
      '/v1/messages',
      this.buildRequestBody(messages, options),
      options.signal
    )

    const parsed = MessagesResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected Anthropic response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        'api_error'
      )
    }
    return this.parseResponse(parsed.data)
  }

  /**
   * Build request body for Anthropic API.
   */
  private buildRequestBody(
    messages: ConversationMessage[],
    options: ProviderRequestOptions
  ): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: options.model || this.config.defaultModel,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      max_tokens: options.maxTokens ?? 4096,
    }

    if (options.system) {
      body.system = options.system
    }

    if (options.temperature !== undefined) {
      body.temperature = options.temperature
    }

    return body
  }

  private parseResponse(data: MessagesResponse): ProviderResponse {
    const text = data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')

    return {
      id: data.id,
      model: data.model,
      text,
      stopReason: this.parseStopReason(data.stop_reason),
      usage: {
        inputTokens: data.usage?.input_tokens ?? 0,
        outputTokens: data.usage?.output_tokens ?? 0,
      },
    }
  }

  private parseStopReason(reason: string | null | undefined): StopReason {
    switch (reason) {
      case 'max_tokens':
        return 'max_tokens'
      case 'stop_sequence':
        return 'stop_sequence'
      default:
        return 'end_turn'
    }
  }
}
