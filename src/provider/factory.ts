import type { AppConfig } from '../config/schema.js'
import { resolveCredential, type CredentialLookupOptions } from '../config/credentials.js'
import { AnthropicProvider } from './anthropic.js'
import { MockProvider } from './mock.js'
import { OpenAIProvider } from './openai.js'
import type { Provider, ProviderName } from './types.js'

/**
 * Create the providers named by the configured models.
 *
 * The secondary model's provider is only created when dual verification
 * is enabled. API keys are resolved through the credential layer, so a
 * missing key fails here with ConfigError.
 */
export async function createProviders(
  config: AppConfig,
  credentials: CredentialLookupOptions = {}
): Promise<Partial<Record<ProviderName, Provider>>> {
  const names = new Set<ProviderName>([config.models.primary.provider])
  if (config.verification.enabled) {
    names.add(config.models.secondary.provider)
  }

  const providers: Partial<Record<ProviderName, Provider>> = {}
  for (const name of names) {
    switch (name) {
      case 'anthropic': {
        const settings = config.providers.anthropic
        providers.anthropic = new AnthropicProvider({
          apiKey: await resolveCredential(settings.apiKeyRef, credentials),
          baseUrl: settings.baseUrl,
          timeout: settings.timeout,
          maxRetries: settings.maxRetries,
        })
        break
      }
      case 'openai': {
        const settings = config.providers.openai
        providers.openai = new OpenAIProvider({
          apiKey: await resolveCredential(settings.apiKeyRef, credentials),
          baseUrl: settings.baseUrl,
          timeout: settings.timeout,
          maxRetries: settings.maxRetries,
        })
        break
      }
      case 'mock':
        // Offline runs may be long-lived; nothing reads the call log
        providers.mock = new MockProvider({ maxRecordedCalls: 0 })
        break
    }
  }

  return providers
}
