/**
 * Model providers that can be named in configuration.
 */
export const PROVIDER_NAMES = ['anthropic', 'openai', 'mock'] as const

export type ProviderName = (typeof PROVIDER_NAMES)[number]

export type MessageRole = 'user' | 'assistant'

/**
 * One turn sent to a model. Classification prompts are plain text.
 */
export interface ConversationMessage {
  role: MessageRole
  content: string
}

export interface ProviderRequestOptions {
  /** Vendor model id */
  model: string
  maxTokens?: number
  /** 0-1; low values keep classifications repeatable */
  temperature?: number
  /** Overrides the provider's own system prompt */
  system?: string
  /** Aborts the in-flight HTTP request */
  signal?: AbortSignal
}

/**
 * Normalised finish reason across vendors.
 */
export type StopReason = 'end_turn' | 'max_tokens' | 'stop_sequence'

export interface TokenUsage {
  inputTokens: number
  outputTokens: number
}

/**
 * A completed model call, reduced to what classification reads.
 */
export interface ProviderResponse {
  /** Vendor request id */
  id: string
  /** Model id as reported back by the vendor */
  model: string
  /** All text blocks of the reply, concatenated */
  text: string
  stopReason: StopReason
  usage: TokenUsage
}

/**
 * A text-completion backend. Implementations own their transport,
 * timeout and retry handling.
 */
export interface Provider {
  readonly name: string

  createMessage(
    messages: ConversationMessage[],
    options: ProviderRequestOptions
  ): Promise<ProviderResponse>

  /** Rough token estimate, used for audit usage figures */
  countTokens(text: string): number

  /** False when the provider has no credentials to call with */
  isAvailable(): boolean
}

export type ProviderErrorCode =
  | 'authentication_error'
  | 'rate_limit_error'
  | 'overloaded_error'
  | 'invalid_request_error'
  | 'api_error'
  | 'network_error'
  | 'timeout_error'
  | 'context_length_exceeded'
  | 'unknown_error'

/**
 * Failure of a model call. `code` becomes the failure code of the
 * classification outcome; `retryAfter` is in seconds.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly retryable: boolean = false,
    public readonly retryAfter?: number,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'ProviderError'
  }
}
