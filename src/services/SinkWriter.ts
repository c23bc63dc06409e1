/**
 * SinkWriter
 *
 * Writes records into a document store collection:
 * - each record is upserted under a deterministic id derived from its logical key
 * - records are sent in bounded batches, several batches in flight at once
 * - transient batch failures are retried with exponential backoff
 * - a batch that still fails is recorded and the remaining batches continue,
 *   unless fail-fast is set, in which case the write is aborted
 */

import type { DocumentStore, StoreDocument } from '../store/DocumentStore'
import { documentId } from '../store/documentId'
import type { CollectionName, CollectionWriteResult, FailedBatch } from '../types/pipeline'
import { getLoggingService } from './LoggingService'
import { runWithConcurrency } from './utils/ConcurrencyPool'
import { SinkWriteError, getErrorMessage } from './utils/errorUtils'
import { retryWithBackoff } from './utils/retryWithBackoff'

export interface SinkWriterOptions {
  /** Documents per bulk request (default: 500) */
  batchSize?: number
  /** Batches in flight per collection (default: 2) */
  concurrency?: number
  /** Abort on the first batch that fails after retries (default: false) */
  failFast?: boolean
  /** Retry attempts after the first try (default: 3) */
  maxRetries?: number
  /** First backoff delay in ms (default: 1000) */
  initialDelayMs?: number
  /** Backoff cap in ms (default: 30000) */
  maxDelayMs?: number
  /** Randomize backoff delays (default: true) */
  jitter?: boolean
}

const DEFAULT_OPTIONS: Required<SinkWriterOptions> = {
  batchSize: 500,
  concurrency: 2,
  failFast: false,
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  jitter: true,
}

/** Logical key of a record, as one or more parts */
export type KeyOf<T> = (record: T) => readonly string[]

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size))
  }
  return batches
}

function isTransient(error: unknown): boolean {
  return error instanceof SinkWriteError && error.retryable
}

export class SinkWriter {
  private readonly options: Required<SinkWriterOptions>

  constructor(
    private readonly store: DocumentStore,
    options: SinkWriterOptions = {}
  ) {
    this.options = {
      batchSize: options.batchSize ?? DEFAULT_OPTIONS.batchSize,
      concurrency: options.concurrency ?? DEFAULT_OPTIONS.concurrency,
      failFast: options.failFast ?? DEFAULT_OPTIONS.failFast,
      maxRetries: options.maxRetries ?? DEFAULT_OPTIONS.maxRetries,
      initialDelayMs: options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs,
      jitter: options.jitter ?? DEFAULT_OPTIONS.jitter,
    }
    if (!Number.isInteger(this.options.batchSize) || this.options.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.options.batchSize}`)
    }
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.options.concurrency}`)
    }
  }

  /**
   * Convert records into store documents keyed by their logical key.
   * Two records with the same key would overwrite each other, so that is rejected.
   */
  toDocuments<T extends object>(collection: CollectionName, records: Iterable<T>, keyOf: KeyOf<T>): StoreDocument[] {
    const seen = new Set<string>()
    const documents: StoreDocument[] = []
    for (const record of records) {
      const id = documentId(keyOf(record))
      if (seen.has(id)) {
        throw new Error(`Duplicate document id "${id}" in ${collection}`)
      }
      seen.add(id)
      documents.push({ id, body: record })
    }
    return documents
  }

  /**
   * Upsert every record into the collection
   *
   * @throws SinkWriteError in fail-fast mode, for the first batch that could not be written
   */
  async write<T extends object>(
    collection: CollectionName,
    records: Iterable<T>,
    keyOf: KeyOf<T>
  ): Promise<CollectionWriteResult> {
    const documents = this.toDocuments(collection, records, keyOf)
    const batches = chunk(documents, this.options.batchSize)
    const failedBatches: FailedBatch[] = []
    const abort: { failure: { batchIndex: number; cause: unknown; ids: string[] } | null } = { failure: null }

    console.log(
      `[SinkWriter] Writing ${documents.length} documents to ${collection} ` +
        `in ${batches.length} batches (concurrency ${this.options.concurrency})`
    )

    const { results } = await runWithConcurrency(
      batches,
      async (batch, batchIndex) => {
        try {
          const result = await retryWithBackoff(() => this.store.bulkUpsert(collection, batch), {
            maxRetries: this.options.maxRetries,
            initialDelay: this.options.initialDelayMs,
            maxDelay: this.options.maxDelayMs,
            jitter: this.options.jitter,
            isRetryable: isTransient,
            onRetry: (attempt, error, delay) => {
              console.warn(
                `[SinkWriter] ${collection} batch ${batchIndex}: retry ${attempt}/${this.options.maxRetries} ` +
                  `in ${delay}ms after: ${error.message}`
              )
            },
          })
          getLoggingService().verbose('[SinkWriter]', `${collection} batch ${batchIndex}: ${result.written} documents written`)
          return result.written
        } catch (error) {
          const batchIds = batch.map((doc) => doc.id)
          const rejected = error instanceof SinkWriteError ? new Set(error.ids) : new Set<string>()
          const ids = rejected.size > 0 ? batchIds.filter((id) => rejected.has(id)) : batchIds
          const failed: FailedBatch = { collection, batch_index: batchIndex, ids, error: getErrorMessage(error) }
          failedBatches.push(failed)
          console.error(`[SinkWriter] ${collection} batch ${batchIndex} failed (${ids.length} documents): ${failed.error}`)

          if (this.options.failFast && !abort.failure) {
            abort.failure = { batchIndex, cause: error, ids }
          }
          // The store writes the documents it did not reject
          return batch.length - ids.length
        }
      },
      { limit: this.options.concurrency, shouldStop: () => abort.failure !== null }
    )

    failedBatches.sort((a, b) => a.batch_index - b.batch_index)
    const written = results.reduce<number>((sum, count) => sum + (count ?? 0), 0)

    const { failure } = abort
    if (failure) {
      throw new SinkWriteError(
        `Aborting ${collection} write: batch ${failure.batchIndex} failed: ${getErrorMessage(failure.cause)}`,
        {
          collection,
          ids: failure.ids,
          retryable: false,
          status: failure.cause instanceof SinkWriteError ? failure.cause.status : undefined,
          result: {
            collection,
            attempted: documents.length,
            written,
            pruned: 0,
            stored: null,
            failed_batches: failedBatches,
          },
          cause: failure.cause,
        }
      )
    }

    console.log(
      `[SinkWriter] ${collection}: ${written}/${documents.length} documents written` +
        (failedBatches.length > 0 ? `, ${failedBatches.length} batches failed` : '')
    )

    return {
      collection,
      attempted: documents.length,
      written,
      pruned: 0,
      stored: null,
      failed_batches: failedBatches,
    }
  }
}
