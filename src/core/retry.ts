// File: src/core/retry.ts
// Exponential backoff policy applied to every remote call site

import { Logger } from '../types'
import { RateLimitExhaustedError, TransientIOError } from './errors'

export interface RetryOptions {
  maxAttempts: number
  baseDelayMs: number
  multiplier: number
  maxDelayMs: number
  jitterMs: number
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30000,
  jitterMs: 1000,
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  logger?: Logger
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Retry policy with capped exponential backoff and additive jitter
 *
 * Only {@link TransientIOError} is retried. Any other error is rethrown on the spot,
 * and a transient error that survives the last attempt becomes a
 * {@link RateLimitExhaustedError}.
 */
export class RetryPolicy {
  readonly options: RetryOptions
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number
  private readonly logger?: Logger

  constructor(options: Partial<RetryOptions> = {}, hooks: RetryHooks = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options }
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.options.maxAttempts}`)
    }
    this.sleep = hooks.sleep ?? defaultSleep
    this.random = hooks.random ?? Math.random
    this.logger = hooks.logger
  }

  /**
   * Delay before the attempt following `attempt` (1-based)
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs, jitterMs } = this.options
    const backoff = Math.min(maxDelayMs, baseDelayMs * multiplier ** (attempt - 1))
    return backoff + this.random() * jitterMs
  }

  async execute<T>(label: string, operation: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: TransientIOError | undefined

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        return await operation(attempt)
      } catch (error) {
        if (!(error instanceof TransientIOError)) {
          throw error
        }
        lastError = error

        if (attempt < this.options.maxAttempts) {
          const delay = this.delayFor(attempt)
          const seconds = (delay / 1000).toFixed(2)
          this.logger?.debug(
            `${label}: ${error.reason} on attempt ${attempt}/${this.options.maxAttempts}, retrying in ${seconds}s`,
          )
          await this.sleep(delay)
        }
      }
    }

    throw new RateLimitExhaustedError(label, this.options.maxAttempts, lastError)
  }
}

/**
 * Run an operation, rejecting with the error from `onTimeout` if it has not settled in time.
 * The timer is always cleared so nothing is left pending.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs)
  })

  try {
    return await Promise.race([operation(), expiry])
  } finally {
    clearTimeout(timer)
  }
}
