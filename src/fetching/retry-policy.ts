import { FetchError, TransientError, errorMessage } from '../shared/errors.js'

/**
 * Bounded retry policy: how many attempts, and how long to wait before
 * attempt `n + 1` after attempt `n` failed.
 */
export interface RetryPolicy {
  maxAttempts: number
  delayMs: (failedAttempt: number) => number
}

export type Sleep = (ms: number) => Promise<void>

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface BackoffOptions {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

/**
 * Exponential backoff: base, 2×base, 4×base, ... capped at maxDelayMs.
 *
 * @example
 * const policy = exponentialBackoff({ maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30000 })
 * policy.delayMs(1) // => 1000
 * policy.delayMs(3) // => 4000
 */
export const exponentialBackoff = ({ maxAttempts, baseDelayMs, maxDelayMs }: BackoffOptions): RetryPolicy => ({
  maxAttempts: Math.max(1, maxAttempts),
  delayMs: (failedAttempt) => Math.min(maxDelayMs, baseDelayMs * 2 ** (failedAttempt - 1)),
})

export interface RetryHooks {
  sleep: Sleep
  /** Called before each wait */
  onRetry?: (error: TransientError, failedAttempt: number, delayMs: number) => void
}

/**
 * Runs `operation` until it succeeds or the policy is exhausted. Only
 * TransientError is retried; anything else propagates immediately. Exhaustion
 * raises FetchError with the last TransientError as cause.
 */
export const withRetry = async <T>(
  label: string,
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  { sleep, onRetry }: RetryHooks
): Promise<T> => {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt)
    } catch (error) {
      if (!(error instanceof TransientError)) throw error

      if (attempt >= policy.maxAttempts) {
        throw new FetchError(
          `${label} failed after ${attempt} attempt${attempt === 1 ? '' : 's'}: ${errorMessage(error)}`,
          { cause: error, details: { attempts: attempt } }
        )
      }

      const delay = policy.delayMs(attempt)
      onRetry?.(error, attempt, delay)
      await sleep(delay)
    }
  }
}
