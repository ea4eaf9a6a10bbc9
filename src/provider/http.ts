import { z } from 'zod'
import { ProviderError, type ProviderErrorCode } from './types.js'

/**
 * Connection settings shared by the HTTP providers.
 */
export interface HttpClientConfig {
  baseUrl: string
  /** Request timeout in ms */
  timeout: number
  /** Retries for retryable failures */
  maxRetries: number
  headers: Record<string, string>
}

// Both vendors wrap failures as { error: { type, message } }
const ErrorBodySchema = z.object({
  error: z
    .object({
      type: z.string().nullish(),
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .optional(),
})

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ProviderError('Request aborted', 'unknown_error'))
      return
    }
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

function backoff(error: ProviderError | undefined, attempt: number): number {
  return error?.retryAfter !== undefined
    ? error.retryAfter * 1000
    : Math.pow(2, attempt) * 1000
}

/**
 * Map an error response to a ProviderError.
 */
export async function parseErrorResponse(response: Response): Promise<ProviderError> {
  let body: unknown
  try {
    body = await response.json()
  } catch {
    body = { error: { message: response.statusText } }
  }

  const parsed = ErrorBodySchema.safeParse(body)
  const details = parsed.success ? parsed.data.error : undefined
  const errorType = details?.type ?? details?.code ?? 'api_error'
  const message = details?.message || `HTTP ${response.status}`

  let code: ProviderErrorCode = 'api_error'
  let retryable = false
  let retryAfter: number | undefined

  switch (response.status) {
    case 401:
    case 403:
      code = 'authentication_error'
      break
    case 429: {
      code = 'rate_limit_error'
      // Exhausted quota does not recover by waiting
      if (errorType === 'insufficient_quota') break
      retryable = true
      const retryHeader = response.headers.get('retry-after')
      const seconds = retryHeader ? parseInt(retryHeader, 10) : NaN
      retryAfter = Number.isFinite(seconds) ? seconds : 60
      break
    }
    case 529:
      code = 'overloaded_error'
      retryable = true
      retryAfter = 30
      break
    case 400:
      code = 'invalid_request_error'
      if (/context|token/i.test(message)) {
        code = 'context_length_exceeded'
      }
      break
    case 500:
    case 502:
    case 503:
    case 504:
      code = 'api_error'
      retryable = true
      break
  }

  return new ProviderError(message, code, retryable, retryAfter)
}

/**
 * POST a JSON body and return the decoded JSON response.
 *
 * Each attempt is bounded by the configured timeout. Retryable failures
 * (rate limits, overload, 5xx, network errors) are retried up to
 * maxRetries times with exponential backoff or the server's retry-after.
 * An abort from the caller's signal is never retried.
 */
export async function postJson(
  config: HttpClientConfig,
  path: string,
  body: unknown,
  signal?: AbortSignal
): Promise<unknown> {
  const url = `${config.baseUrl}${path}`
  let lastError: ProviderError | undefined

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    if (attempt > 0) {
      await delay(backoff(lastError, attempt - 1), signal)
    }

    const timeout = AbortSignal.timeout(config.timeout)
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout

    let response: Response
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...config.headers },
        body: JSON.stringify(body),
        signal: combined,
      })
    } catch (error) {
      if (signal?.aborted) {
        throw new ProviderError('Request aborted', 'unknown_error')
      }
      if (timeout.aborted) {
        lastError = new ProviderError(
          `Request timed out after ${config.timeout}ms`,
          'timeout_error',
          true
        )
      } else {
        const cause = error instanceof Error ? error : undefined
        lastError = new ProviderError(
          cause?.message ?? 'Network request failed',
          'network_error',
          true,
          undefined,
          cause
        )
      }
      continue
    }

    if (!response.ok) {
      lastError = await parseErrorResponse(response)
      if (!lastError.retryable) throw lastError
      continue
    }

    try {
      return await response.json()
    } catch (error) {
      throw new ProviderError(
        'Response body is not valid JSON',
        'api_error',
        false,
        undefined,
        error instanceof Error ? error : undefined
      )
    }
  }

  throw lastError ?? new ProviderError('Request failed', 'unknown_error')
}
