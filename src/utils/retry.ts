import { setTimeout as delay } from 'timers/promises'

/**
 * Timed wait that rejects when the signal aborts
 */
export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>

export const sleep: WaitFn = async (ms, signal) => {
  await delay(ms, undefined, { signal })
}

export interface RetryOptions {
  attempts: number
  baseDelayMs: number
  maxDelayMs: number
  backoffMultiplier?: number
  wait?: WaitFn
  signal?: AbortSignal
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
}

/**
 * Delay before the retry that follows the given (1-based) attempt
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>
): number {
  const multiplier = options.backoffMultiplier ?? 2
  return Math.min(options.baseDelayMs * multiplier ** (attempt - 1), options.maxDelayMs)
}

/**
 * Raised when every attempt failed
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError)
    super(`Gave up after ${attempts} attempt(s): ${detail}`)
    this.name = 'RetryExhaustedError'
  }
}

/**
 * Run an operation with bounded exponential backoff
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.wait ?? sleep
  let lastError: unknown
  let made = 0

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    made = attempt
    try {
      return await operation(attempt)
    } catch (error) {
      lastError = error
      if (attempt === options.attempts || options.signal?.aborted) {
        break
      }
      const delayMs = backoffDelay(attempt, options)
      options.onRetry?.(attempt, error, delayMs)
      await wait(delayMs, options.signal)
    }
  }

  throw new RetryExhaustedError(made, lastError)
}
