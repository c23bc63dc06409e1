import { describe, it, expect, beforeEach } from 'vitest'
import { SinkWriter, chunk } from '../../src/services/SinkWriter'
import { SinkWriteError } from '../../src/services/utils/errorUtils'
import { COLLECTION_MAPPINGS } from '../../src/store/collectionMappings'
import { InMemoryDocumentStore } from '../helpers/InMemoryDocumentStore'

interface Item {
  id: string
  value: number
}

const keyOf = (item: Item) => [item.id]

function items(count: number): Item[] {
  return Array.from({ length: count }, (_, i) => ({ id: String(i + 1), value: i + 1 }))
}

const FAST_RETRY = { initialDelayMs: 1, jitter: false }

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('Expected the promise to reject')
}

describe('SinkWriter', () => {
  let store: InMemoryDocumentStore

  beforeEach(async () => {
    store = new InMemoryDocumentStore()
    await store.ensureCollection('tracks', COLLECTION_MAPPINGS.tracks)
  })

  describe('chunk', () => {
    it('should split into batches of at most the given size', () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
      expect(chunk([], 2)).toEqual([])
    })
  })

  it('should reject a non-positive batch size or concurrency', () => {
    expect(() => new SinkWriter(store, { batchSize: 0 })).toThrow(RangeError)
    expect(() => new SinkWriter(store, { concurrency: 0 })).toThrow('concurrency must be a positive integer, got 0')
  })

  it('should upsert every record in bounded batches', async () => {
    const writer = new SinkWriter(store, { batchSize: 2, ...FAST_RETRY })

    const result = await writer.write('tracks', items(5), keyOf)

    expect(result).toEqual({
      collection: 'tracks',
      attempted: 5,
      written: 5,
      pruned: 0,
      stored: null,
      failed_batches: [],
    })
    expect(store.bulkCalls.map((call) => call.ids)).toEqual([['1', '2'], ['3', '4'], ['5']])
    expect(store.get('tracks', '3')).toEqual({ id: '3', value: 3 })
  })

  it('should overwrite instead of duplicating on a second write', async () => {
    const writer = new SinkWriter(store, { batchSize: 2, ...FAST_RETRY })

    await writer.write('tracks', items(3), keyOf)
    await writer.write('tracks', [{ id: '2', value: 20 }, ...items(3).filter((i) => i.id !== '2')], keyOf)

    expect(await store.count('tracks')).toBe(3)
    expect(store.get('tracks', '2')).toEqual({ id: '2', value: 20 })
  })

  it('should record a failed batch and continue with the rest', async () => {
    store.failWhen({ matches: (_c, docs) => docs.some((d) => d.id === '5'), retryable: false })
    const writer = new SinkWriter(store, { batchSize: 2, ...FAST_RETRY })

    const result = await writer.write('tracks', items(10), keyOf)

    expect(result.written).toBe(8)
    expect(result.failed_batches).toEqual([
      { collection: 'tracks', batch_index: 2, ids: ['5', '6'], error: 'Injected failure for 2 documents' },
    ])
    expect(await store.count('tracks')).toBe(8)
    expect(store.get('tracks', '5')).toBeUndefined()
  })

  it('should count the documents of a partly rejected batch as written', async () => {
    store.failWhen({ matches: (_c, docs) => docs.some((d) => d.id === '3'), retryable: false, rejects: (d) => d.id === '3' })
    const writer = new SinkWriter(store, { batchSize: 2, ...FAST_RETRY })

    const result = await writer.write('tracks', items(4), keyOf)

    expect(result.written).toBe(3)
    expect(result.failed_batches).toEqual([
      { collection: 'tracks', batch_index: 1, ids: ['3'], error: 'Injected failure for 1 documents' },
    ])
    expect(await store.count('tracks')).toBe(3)
  })

  it('should retry transient failures with backoff', async () => {
    store.failWhen({ matches: (_c, docs) => docs.some((d) => d.id === '1'), retryable: true, times: 2 })
    const writer = new SinkWriter(store, { batchSize: 2, ...FAST_RETRY })

    const result = await writer.write('tracks', items(4), keyOf)

    expect(result.failed_batches).toEqual([])
    expect(result.written).toBe(4)
    expect(store.bulkCalls).toHaveLength(4)
    expect(console.warn).toHaveBeenCalledWith(
      '[SinkWriter] tracks batch 0: retry 1/3 in 1ms after: Injected failure for 2 documents'
    )
    expect(console.warn).toHaveBeenCalledWith(
      '[SinkWriter] tracks batch 0: retry 2/3 in 2ms after: Injected failure for 2 documents'
    )
  })

  it('should give up on a transient failure after the retry limit', async () => {
    store.failWhen({ matches: (_c, docs) => docs.some((d) => d.id === '1'), retryable: true })
    const writer = new SinkWriter(store, { batchSize: 2, maxRetries: 2, ...FAST_RETRY })

    const result = await writer.write('tracks', items(4), keyOf)

    expect(result.failed_batches.map((b) => b.ids)).toEqual([['1', '2']])
    expect(store.bulkCalls.filter((call) => call.ids.includes('1'))).toHaveLength(3)
  })

  it('should not retry a permanent failure', async () => {
    store.failWhen({ matches: () => true, retryable: false })
    const writer = new SinkWriter(store, { batchSize: 10, ...FAST_RETRY })

    const result = await writer.write('tracks', items(3), keyOf)

    expect(store.bulkCalls).toHaveLength(1)
    expect(result.failed_batches).toHaveLength(1)
    expect(result.written).toBe(0)
  })

  it('should record every id of a batch that failed with an unexpected error', async () => {
    const writer = new SinkWriter(new InMemoryDocumentStore(), { batchSize: 2, ...FAST_RETRY })

    const result = await writer.write('artists', items(3), keyOf)

    expect(result.failed_batches).toEqual([
      { collection: 'artists', batch_index: 0, ids: ['1', '2'], error: 'Collection artists does not exist' },
      { collection: 'artists', batch_index: 1, ids: ['3'], error: 'Collection artists does not exist' },
    ])
  })

  it('should abort on the first failed batch in fail-fast mode', async () => {
    store.failWhen({ matches: (_c, docs) => docs.some((d) => d.id === '3'), retryable: false })
    const writer = new SinkWriter(store, { batchSize: 2, concurrency: 1, failFast: true, ...FAST_RETRY })

    const error = await captureError(writer.write('tracks', items(10), keyOf))

    expect(error).toBeInstanceOf(SinkWriteError)
    expect(error).toMatchObject({
      message: 'Aborting tracks write: batch 1 failed: Injected failure for 2 documents',
      collection: 'tracks',
      ids: ['3', '4'],
      retryable: false,
    })
    expect(error instanceof SinkWriteError && error.result).toEqual({
      collection: 'tracks',
      attempted: 10,
      written: 2,
      pruned: 0,
      stored: null,
      failed_batches: [
        { collection: 'tracks', batch_index: 1, ids: ['3', '4'], error: 'Injected failure for 2 documents' },
      ],
    })
    expect(store.bulkCalls).toHaveLength(2)
    expect(await store.count('tracks')).toBe(2)
  })

  it('should reject records that map to the same document id', async () => {
    const writer = new SinkWriter(store)

    await expect(writer.write('tracks', [{ id: '1', value: 1 }, { id: '1', value: 2 }], keyOf)).rejects.toThrow(
      'Duplicate document id "1" in tracks'
    )
    expect(store.bulkCalls).toHaveLength(0)
  })

  it('should handle an empty record set', async () => {
    const writer = new SinkWriter(store)

    const result = await writer.write('tracks', [], keyOf)

    expect(result).toEqual({
      collection: 'tracks',
      attempted: 0,
      written: 0,
      pruned: 0,
      stored: null,
      failed_batches: [],
    })
    expect(store.bulkCalls).toHaveLength(0)
  })
})
