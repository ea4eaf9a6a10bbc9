import { randomUUID } from 'crypto'
import type {
  Provider,
  ConversationMessage,
  ProviderRequestOptions,
  ProviderResponse,
  StopReason,
} from './types.js'
import { ProviderError } from './types.js'

/**
 * Mock response generator function. Returning undefined passes the
 * request on to the next generator.
 */
export type MockResponseGenerator = (
  messages: ConversationMessage[],
  options: ProviderRequestOptions
) => MockResponse | undefined | Promise<MockResponse | undefined>

/**
 * Mock response structure.
 */
export interface MockResponse {
  text: string
  stopReason?: StopReason
  delay?: number
}

/**
 * One recorded request.
 */
export interface MockCall {
  messages: ConversationMessage[]
  options: ProviderRequestOptions
}

/**
 * Mock provider configuration.
 */
export interface MockProviderConfig {
  /** Name reported by the provider */
  name?: string
  /** Default response if no generator matches */
  defaultResponse?: MockResponse
  /** Custom response generators */
  responseGenerators?: MockResponseGenerator[]
  /** Approximate tokens per character */
  tokensPerChar?: number
  /** Requests kept in `calls`, oldest dropped first; 0 records none (default 1000) */
  maxRecordedCalls?: number
}

/**
 * Mock provider for tests and offline runs. Records every request and
 * can be scripted to fail.
 */
export class MockProvider implements Provider {
  readonly name: string
  readonly calls: MockCall[] = []
  private config: Required<Omit<MockProviderConfig, 'name'>>
  private failures: ProviderError[] = []

  constructor(config: MockProviderConfig = {}) {
    this.name = config.name ?? 'mock'
    this.config = {
      defaultResponse: config.defaultResponse ?? { text: 'This is a mock response.' },
      responseGenerators: config.responseGenerators ?? [],
      tokensPerChar: config.tokensPerChar ?? 0.25,
      maxRecordedCalls: config.maxRecordedCalls ?? 1000,
    }
  }

  isAvailable(): boolean {
    return true
  }

  countTokens(text: string): number {
    return Math.ceil(text.length * this.config.tokensPerChar)
  }

  /**
   * Create a message. Queued failures are thrown first, in order.
   */
  async createMessage(
    messages: ConversationMessage[],
    options: ProviderRequestOptions
  ): Promise<ProviderResponse> {
    this.record({ messages, options })
    this.throwIfAborted(options.signal)

    const failure = this.failures.shift()
    if (failure) {
      throw failure
    }

    let response = this.config.defaultResponse
    for (const generator of this.config.responseGenerators) {
      const generated = await generator(messages, options)
      if (generated) {
        response = generated
        break
      }
    }

    if (response.delay) {
      await this.delay(response.delay, options.signal)
    }

    return this.buildResponse(messages, response, options)
  }

  /**
   * Add a response generator.
   */
  addGenerator(generator: MockResponseGenerator): void {
    this.config.responseGenerators.push(generator)
  }

  /**
   * Set the default response.
   */
  setDefaultResponse(response: MockResponse): void {
    this.config.defaultResponse = response
  }

  /**
   * Make the next request fail with the given error.
   */
  failNext(error: ProviderError): void {
    this.failures.push(error)
  }

  /**
   * Reset the provider state.
   */
  reset(): void {
    this.calls.length = 0
    this.failures = []
    this.config.responseGenerators = []
  }

  private record(call: MockCall): void {
    const limit = this.config.maxRecordedCalls
    if (limit <= 0) return
    this.calls.push(call)
    if (this.calls.length > limit) {
      this.calls.splice(0, this.calls.length - limit)
    }
  }

  private buildResponse(
    messages: ConversationMessage[],
    mock: MockResponse,
    options: ProviderRequestOptions
  ): ProviderResponse {
    const prompt = messages.map((m) => m.content).join('')

    return {
      id: `mock-${randomUUID()}`,
      model: options.model,
      text: mock.text,
      stopReason: mock.stopReason ?? 'end_turn',
      usage: {
        inputTokens: this.countTokens(prompt),
        outputTokens: this.countTokens(mock.text),
      },
    }
  }

  private throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new ProviderError('Request aborted', 'unknown_error')
    }
  }

  private delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }, ms)
      const onAbort = (): void => {
        clearTimeout(timer)
        reject(new ProviderError('Request aborted', 'unknown_error'))
      }
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}

/**
 * Create a mock provider.
 */
export function createMockProvider(config?: MockProviderConfig): MockProvider {
  return new MockProvider(config)
}

/**
 * Create a mock response generator that matches on user message content.
 */
export function matchUserMessage(
  pattern: string | RegExp,
  response: MockResponse
): MockResponseGenerator {
  return (messages) => {
    const lastUserMessage = [...messages].reverse().find((m) => m.role === 'user')
    if (!lastUserMessage) return undefined

    const content = lastUserMessage.content
    const matches =
      typeof pattern === 'string' ? content.includes(pattern) : pattern.test(content)

    return matches ? response : undefined
  }
}
