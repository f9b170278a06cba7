// File: src/core/pool.ts
// Bounded worker pool for independent I/O-bound units

export type PoolOutcome<R> = { ok: true; value: R } | { ok: false; error: unknown }

/**
 * Run `worker` over every item with at most `limit` units in flight.
 *
 * Each unit writes only its own slot of the result array, so outcomes line up
 * with `items` whatever order the units finish in. A unit that throws is recorded
 * as a failed outcome; it never rejects the pool or cancels its siblings.
 *
 * @param items - Work items
 * @param limit - Maximum number of units running at once
 * @param worker - Unit of work for one item
 * @returns One outcome per item, in item order
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PoolOutcome<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Pool size must be a positive integer, got ${limit}`)
  }

  const outcomes = new Array<PoolOutcome<R>>(items.length)
  let next = 0

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      try {
        outcomes[index] = { ok: true, value: await worker(items[index], index) }
      } catch (error) {
        outcomes[index] = { ok: false, error }
      }
    }
  }

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane())
  await Promise.all(lanes)

  return outcomes
}
