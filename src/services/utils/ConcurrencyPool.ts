/**
 * Bounded-parallelism runner
 *
 * Runs `worker` over `items` with at most `limit` calls in flight. Items are
 * started in order. Once `shouldStop()` returns true (or a worker throws) no
 * further items are started; calls already in flight are awaited.
 */

export interface PoolOptions {
  /** Max concurrent workers (minimum 1) */
  limit: number
  /** Checked before each item is started */
  shouldStop?: () => boolean
}

export interface PoolResult<R> {
  /** Result per item index; undefined for items never started */
  results: Array<R | undefined>
  started: number
}

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<PoolResult<R>> {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined)
  const laneCount = Math.max(1, Math.min(options.limit, items.length))
  let next = 0
  const failure: { failed: boolean; error: unknown } = { failed: false, error: undefined }

  const stopped = (): boolean => failure.failed || (options.shouldStop?.() ?? false)

  const lane = async (): Promise<void> => {
    while (next < items.length && !stopped()) {
      const index = next++
      try {
        results[index] = await worker(items[index], index)
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true
          failure.error = error
        }
      }
    }
  }

  await Promise.all(Array.from({ length: laneCount }, () => lane()))

  if (failure.failed) {
    throw failure.error
  }

  return { results, started: next }
}
