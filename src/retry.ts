/**
 * Retry - bounded exponential backoff around store calls
 */

import { StoreUnavailableError } from './errors'
import type { Logger } from './logger'

export type RetryConfig = {
  maxRetries: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
}

/** No retries at all */
export const NO_RETRY: RetryConfig = { ...DEFAULT_RETRY_CONFIG, maxRetries: 0 }

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function calculateDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt)
  return Math.min(delay, config.maxDelayMs)
}

/** Only an unreachable store is worth another attempt */
export function isRetryable(error: unknown): boolean {
  return error instanceof StoreUnavailableError
}

/**
 * Run `operation`, retrying retryable failures up to `config.maxRetries` times.
 * The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  operationName = 'operation',
  logger?: Logger,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation()
    } catch (error) {
      if (attempt >= config.maxRetries || !isRetryable(error)) throw error
      const delay = calculateDelay(attempt, config)
      const message = error instanceof Error ? error.message : String(error)
      logger?.warn(`${operationName} failed (attempt ${attempt + 1}/${config.maxRetries + 1}): ${message}; retrying in ${delay}ms`)
      if (delay > 0) await sleep(delay)
    }
  }
}
