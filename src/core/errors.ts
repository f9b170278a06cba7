// File: src/core/errors.ts
// Error taxonomy for collection, caching and configuration failures.
// Only configuration, authentication and total collection failures end the process;
// everything else degrades to a cache miss or a partially populated dataset.

export type TransientReason = 'throttled' | 'timeout' | 'network' | 'server'

/**
 * Base class carrying a stable code and the process exit code to use when fatal
 */
export class ReporterError extends Error {
  readonly code: string
  readonly exitCode: number
  readonly details?: Record<string, unknown>

  constructor(code: string, message: string, exitCode = 1, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = new.target.name
    this.code = code
    this.exitCode = exitCode
    this.details = details
  }
}

// Bad flags or settings, raised before any work starts
export class FatalConfigurationError extends ReporterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, 2, details)
  }
}

// No usable credentials
export class AuthenticationError extends ReporterError {
  constructor(message: string, cause?: unknown) {
    super('AUTH_FAILED', message, 3, undefined, cause)
  }
}

/**
 * A remote call failed in a way that may succeed if repeated
 * (throttling, timeout, dropped connection, 5xx)
 */
export class TransientIOError extends ReporterError {
  readonly reason: TransientReason

  constructor(reason: TransientReason, message: string, cause?: unknown) {
    super('TRANSIENT_IO', message, 1, { reason }, cause)
    this.reason = reason
  }
}

/**
 * Retry budget spent on a transient failure
 */
export class RateLimitExhaustedError extends ReporterError {
  readonly attempts: number

  constructor(label: string, attempts: number, lastError?: TransientIOError) {
    const suffix = lastError ? `: ${lastError.message}` : ''
    super(
      'RATE_LIMIT_EXHAUSTED',
      `${label} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}${suffix}`,
      1,
      { label, attempts },
      lastError,
    )
    this.attempts = attempts
  }
}

// Only ever logged: a corrupt cache is a cache miss
export class CacheCorruptionError extends ReporterError {
  constructor(filePath: string, reason: string) {
    super('CACHE_CORRUPT', `Cache file ${filePath} is unusable (${reason})`, 1, { filePath, reason })
  }
}

// Nothing usable could be collected
export class CollectionError extends ReporterError {
  constructor(message: string, cause?: unknown) {
    super('COLLECTION_FAILED', message, 4, undefined, cause)
  }
}

/**
 * Short human-readable description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ReporterError ? error.exitCode : 1
}
