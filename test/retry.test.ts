import { describe, expect, it } from 'vitest'
import { RetryPolicy, withTimeout } from '../src/core/retry'
import { RateLimitExhaustedError, TransientIOError } from '../src/core/errors'

function policy(maxAttempts = 3) {
  const sleeps: number[] = []
  const retry = new RetryPolicy(
    { maxAttempts },
    {
      sleep: async (ms) => {
        sleeps.push(ms)
      },
      random: () => 0.5,
    },
  )
  return { retry, sleeps }
}

describe('RetryPolicy', () => {
  it('grows the delay exponentially up to the cap, plus jitter', () => {
    const { retry } = policy()

    expect(retry.delayFor(1)).toBe(1500)
    expect(retry.delayFor(2)).toBe(2500)
    expect(retry.delayFor(3)).toBe(4500)
    expect(retry.delayFor(6)).toBe(30500)
  })

  it('retries transient failures and returns the eventual result', async () => {
    const { retry, sleeps } = policy()
    let calls = 0

    const result = await retry.execute('op', async () => {
      calls++
      if (calls < 3) {
        throw new TransientIOError('throttled', 'slow down')
      }
      return 'ok'
    })

    expect(result).toBe('ok')
    expect(calls).toBe(3)
    expect(sleeps).toEqual([1500, 2500])
  })

  it('rethrows other errors at once', async () => {
    const { retry, sleeps } = policy()
    let calls = 0

    await expect(
      retry.execute('op', async () => {
        calls++
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')
    expect(calls).toBe(1)
    expect(sleeps).toEqual([])
  })

  it('gives up after the last attempt with a rate limit error', async () => {
    const { retry, sleeps } = policy()

    const error = await retry
      .execute('op', async () => {
        throw new TransientIOError('throttled', 'slow down')
      })
      .catch((caught: unknown) => caught)

    if (!(error instanceof RateLimitExhaustedError)) {
      throw new Error('expected a RateLimitExhaustedError')
    }
    expect(error.attempts).toBe(3)
    expect(error.code).toBe('RATE_LIMIT_EXHAUSTED')
    expect(error.message).toBe('op failed after 3 attempts: slow down')
    expect(error.cause).toBeInstanceOf(TransientIOError)
    expect(sleeps).toEqual([1500, 2500])
  })

  it('passes the attempt number to the operation', async () => {
    const { retry } = policy(2)
    const attempts: number[] = []

    await retry
      .execute('op', async (attempt) => {
        attempts.push(attempt)
        throw new TransientIOError('server', 'unavailable')
      })
      .catch(() => undefined)

    expect(attempts).toEqual([1, 2])
  })

  it('rejects a budget below one attempt', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError)
  })
})

describe('withTimeout', () => {
  it('returns the result of an operation that settles in time', async () => {
    await expect(withTimeout(async () => 42, 1000, () => new Error('late'))).resolves.toBe(42)
  })

  it('rejects with the timeout error when the operation is too slow', async () => {
    const never = () => new Promise<number>(() => undefined)

    await expect(withTimeout(never, 10, () => new TransientIOError('timeout', 'too slow'))).rejects.toThrow('too slow')
  })
})
