import { describe, it, expect } from 'vitest'
import { runWithConcurrency } from '../../src/services/utils/ConcurrencyPool'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('runWithConcurrency', () => {
  it('should return results in item order', async () => {
    const { results, started } = await runWithConcurrency(
      [30, 10, 20],
      async (ms, index) => {
        await new Promise((resolve) => setTimeout(resolve, ms))
        return `item-${index}`
      },
      { limit: 3 }
    )

    expect(results).toEqual(['item-0', 'item-1', 'item-2'])
    expect(started).toBe(3)
  })

  it('should never run more than the limit at once', async () => {
    let active = 0
    let peak = 0

    await runWithConcurrency(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        active++
        peak = Math.max(peak, active)
        await new Promise((resolve) => setTimeout(resolve, 5))
        active--
      },
      { limit: 3 }
    )

    expect(peak).toBe(3)
  })

  it('should start items in order', async () => {
    const order: number[] = []

    await runWithConcurrency(
      [0, 1, 2, 3, 4],
      async (item) => {
        order.push(item)
      },
      { limit: 2 }
    )

    expect(order).toEqual([0, 1, 2, 3, 4])
  })

  it('should stop starting items once shouldStop returns true', async () => {
    const seen: number[] = []

    const { results, started } = await runWithConcurrency(
      [0, 1, 2, 3, 4],
      async (item) => {
        seen.push(item)
        return item * 10
      },
      { limit: 1, shouldStop: () => seen.includes(1) }
    )

    expect(seen).toEqual([0, 1])
    expect(started).toBe(2)
    expect(results).toEqual([0, 10, undefined, undefined, undefined])
  })

  it('should wait for in-flight items before rethrowing the first error', async () => {
    const slow = deferred()
    let slowFinished = false

    const run = runWithConcurrency(
      ['slow', 'fail', 'never'],
      async (item) => {
        if (item === 'slow') {
          await slow.promise
          slowFinished = true
          return item
        }
        if (item === 'fail') {
          setTimeout(slow.resolve, 5)
          throw new Error('worker failed')
        }
        return item
      },
      { limit: 2 }
    )

    await expect(run).rejects.toThrow('worker failed')
    expect(slowFinished).toBe(true)
  })

  it('should handle an empty list', async () => {
    const { results, started } = await runWithConcurrency([], async () => 1, { limit: 4 })

    expect(results).toEqual([])
    expect(started).toBe(0)
  })
})
