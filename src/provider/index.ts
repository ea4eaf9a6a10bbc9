// Types
export type {
  MessageRole,
  ConversationMessage,
  ProviderRequestOptions,
  StopReason,
  TokenUsage,
  ProviderResponse,
  Provider,
  ProviderErrorCode,
  ProviderName,
} from './types.js'

export { ProviderError, PROVIDER_NAMES } from './types.js'

// HTTP plumbing
export { postJson, parseErrorResponse, type HttpClientConfig } from './http.js'

// Mock provider
export {
  MockProvider,
  createMockProvider,
  matchUserMessage,
  type MockCall,
  type MockProviderConfig,
  type MockResponse,
  type MockResponseGenerator,
} from './mock.js'

// Vendor providers
export { AnthropicProvider, type AnthropicConfig } from './anthropic.js'
export { OpenAIProvider, type OpenAIConfig } from './openai.js'

// Gateway
export {
  ProviderGateway,
  type ModelGateway,
  type ModelRef,
  type InvokeRequest,
  type InvokeResult,
} from './gateway.js'
export { createProviders } from './factory.js'
