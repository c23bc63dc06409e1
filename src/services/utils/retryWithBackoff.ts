/**
 * Retry with Exponential Backoff
 *
 * Provides a utility for retrying failed operations with configurable
 * exponential backoff and jitter to prevent thundering herd problems.
 */

import { getErrorCode } from './errorUtils'

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number
  /** Backoff multiplier (default: 2) */
  backoffFactor?: number
  /** Add random jitter to prevent thundering herd (default: true) */
  jitter?: boolean
  /** HTTP status codes that should trigger a retry (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[]
  /** Overrides the built-in retryable check */
  isRetryable?: (error: unknown) => boolean
  /** Optional callback when a retry occurs */
  onRetry?: (attempt: number, error: Error, delay: number) => void
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'isRetryable'>> = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
  jitter: true,
  retryableStatuses: [429, 500, 502, 503, 504]
}

/** Socket-level failures worth another attempt */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ERR_NETWORK',
])

/**
 * Read an HTTP status from `status`, `statusCode` or an axios-style `response`
 */
function getErrorStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response
    if ('status' in response && typeof response.status === 'number') {
      return response.status
    }
  }
  return undefined
}

/**
 * Check if an error is retryable based on status code or socket error code
 */
export function isRetryableError(error: unknown, retryableStatuses: number[] = DEFAULT_OPTIONS.retryableStatuses): boolean {
  // Timeout errors are retryable
  if (error instanceof Error && error.name === 'AbortError') {
    return true
  }

  const code = getErrorCode(error)
  if (code && RETRYABLE_ERROR_CODES.has(code)) {
    return true
  }

  if (error instanceof Error) {
    const status = getErrorStatus(error)
    if (status !== undefined) {
      return retryableStatuses.includes(status)
    }

    // Check for status in error message (e.g., "HTTP 503")
    const statusMatch = error.message.match(/\bHTTP (\d{3})\b/)
    if (statusMatch) {
      return retryableStatuses.includes(parseInt(statusMatch[1], 10))
    }
  }

  return false
}

/**
 * Calculate delay with exponential backoff and optional jitter
 */
export function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  backoffFactor: number,
  jitter: boolean
): number {
  // Exponential backoff: initialDelay * (backoffFactor ^ attempt)
  let delay = initialDelay * Math.pow(backoffFactor, attempt)

  // Cap at max delay
  delay = Math.min(delay, maxDelay)

  // Add jitter (0-50% of delay) to prevent thundering herd
  if (jitter) {
    const jitterAmount = delay * 0.5 * Math.random()
    delay += jitterAmount
  }

  return Math.floor(delay)
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Retry a function with exponential backoff
 *
 * @example
 * ```typescript
 * const response = await retryWithBackoff(
 *   () => store.bulkUpsert('tracks', documents),
 *   {
 *     maxRetries: 3,
 *     initialDelay: 1000,
 *     onRetry: (attempt, error, delay) => {
 *       console.warn(`[SinkWriter] Retry ${attempt} after ${delay}ms: ${error.message}`)
 *     }
 *   }
 * )
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config: Required<Omit<RetryOptions, 'onRetry' | 'isRetryable'>> = {
    maxRetries: options.maxRetries ?? DEFAULT_OPTIONS.maxRetries,
    initialDelay: options.initialDelay ?? DEFAULT_OPTIONS.initialDelay,
    maxDelay: options.maxDelay ?? DEFAULT_OPTIONS.maxDelay,
    backoffFactor: options.backoffFactor ?? DEFAULT_OPTIONS.backoffFactor,
    jitter: options.jitter ?? DEFAULT_OPTIONS.jitter,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_OPTIONS.retryableStatuses,
  }
  const isRetryable = options.isRetryable ?? ((error: unknown) => isRetryableError(error, config.retryableStatuses))
  let lastError: Error = new Error('Unknown error')

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))

      // Don't retry if we've exhausted attempts
      if (attempt >= config.maxRetries) {
        break
      }

      // Don't retry non-retryable errors
      if (!isRetryable(error)) {
        throw lastError
      }

      const delay = calculateDelay(
        attempt,
        config.initialDelay,
        config.maxDelay,
        config.backoffFactor,
        config.jitter
      )

      if (options.onRetry) {
        options.onRetry(attempt + 1, lastError, delay)
      }

      await sleep(delay)
    }
  }

  // All retries exhausted
  throw lastError
}
