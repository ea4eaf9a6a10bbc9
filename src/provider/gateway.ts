import { ConfigError } from '../config/errors.js'
import {
  PROVIDER_NAMES,
  type Provider,
  type ProviderName,
  type StopReason,
  type TokenUsage,
} from './types.js'

/**
 * A model named by configuration: which provider serves it, and its id.
 */
export interface ModelRef {
  provider: ProviderName
  model: string
}

export interface InvokeRequest {
  model: ModelRef
  prompt: string
  maxTokens: number
  temperature: number
  signal?: AbortSignal
}

export interface InvokeResult {
  /** Raw response text */
  text: string
  /** Model id reported by the provider */
  model: string
  provider: ProviderName
  stopReason: StopReason
  usage: TokenUsage
}

/**
 * Capability the pipeline needs from a model backend.
 */
export interface ModelGateway {
  invoke(request: InvokeRequest): Promise<InvokeResult>
  supports(model: ModelRef): boolean
}

/**
 * ProviderGateway - routes each invocation to the provider named by the
 * model reference.
 *
 * Timeouts and retries belong to the providers; the gateway adds nothing
 * on top of one provider call.
 */
export class ProviderGateway implements ModelGateway {
  private readonly providers = new Map<ProviderName, Provider>()

  constructor(providers: Partial<Record<ProviderName, Provider>> = {}) {
    for (const [name, provider] of Object.entries(providers)) {
      if (provider && isProviderName(name)) {
        this.providers.set(name, provider)
      }
    }
  }

  /**
   * Register or replace the provider for a name.
   */
  register(name: ProviderName, provider: Provider): void {
    this.providers.set(name, provider)
  }

  supports(model: ModelRef): boolean {
    return this.providers.has(model.provider)
  }

  async invoke(request: InvokeRequest): Promise<InvokeResult> {
    const provider = this.providers.get(request.model.provider)
    if (!provider) {
      throw new ConfigError(
        `No provider registered for '${request.model.provider}' (model '${request.model.model}')`,
        'models',
        request.model
      )
    }

    const response = await provider.createMessage(
      [{ role: 'user', content: request.prompt }],
      {
        model: request.model.model,
        maxTokens: request.maxTokens,
        temperature: request.temperature,
        signal: request.signal,
      }
    )

    return {
      text: response.text,
      model: response.model,
      provider: request.model.provider,
      stopReason: response.stopReason,
      usage: response.usage,
    }
  }
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value)
}
