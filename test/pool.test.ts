import { describe, expect, it } from 'vitest'
import { runPool } from '../src/core/pool'

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

describe('runPool', () => {
  it('returns outcomes in item order whatever order units finish in', async () => {
    const outcomes = await runPool([30, 5, 15], 3, async (ms) => {
      await sleep(ms)
      return ms * 2
    })

    expect(outcomes).toEqual([
      { ok: true, value: 60 },
      { ok: true, value: 10 },
      { ok: true, value: 30 },
    ])
  })

  it('keeps at most limit units in flight', async () => {
    let inFlight = 0
    let peak = 0

    await runPool([1, 2, 3, 4, 5, 6, 7], 2, async () => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await sleep(5)
      inFlight--
    })

    expect(peak).toBe(2)
  })

  it('records a failing unit without disturbing the others', async () => {
    const failure = new Error('unit 2 failed')

    const outcomes = await runPool(['a', 'b', 'c'], 2, async (item) => {
      if (item === 'b') {
        throw failure
      }
      return item.toUpperCase()
    })

    expect(outcomes).toEqual([
      { ok: true, value: 'A' },
      { ok: false, error: failure },
      { ok: true, value: 'C' },
    ])
  })

  it('handles an empty list', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([])
  })

  it('rejects a pool size below one', async () => {
    await expect(runPool([1], 0, async () => 1)).rejects.toThrow(RangeError)
  })
})
