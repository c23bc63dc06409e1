/**
 * ElasticsearchStore
 *
 * DocumentStore implementation for an Elasticsearch-compatible HTTP endpoint
 * with basic authentication. Upserts go through the _bulk API using `index`
 * actions with explicit ids, so writing the same id twice overwrites.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios'
import { z } from 'zod'
import { TRANSIENT_STATUSES, type BulkUpsertResult, type CollectionMapping, type DocumentStore, type StoreDocument } from './DocumentStore'
import type { CollectionName } from '../types/pipeline'
import { SinkWriteError, getAxiosErrorDetails } from '../services/utils/errorUtils'
import { isRetryableError } from '../services/utils/retryWithBackoff'

export interface ElasticsearchStoreOptions {
  url: string
  username?: string
  password?: string
  /** Prepended to every collection name, e.g. "music-" gives "music-tracks" */
  indexPrefix?: string
  timeoutMs?: number
  /** Custom axios adapter; used to run against an in-process endpoint */
  adapter?: AxiosAdapter
}

const BulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(
    z.object({
      index: z.object({
        _id: z.string().optional(),
        status: z.number(),
        error: z
          .object({
            type: z.string(),
            reason: z.string().nullish(),
          })
          .passthrough()
          .optional(),
      }),
    })
  ),
})

const CountResponseSchema = z.object({ count: z.number() })
const DeleteByQueryResponseSchema = z.object({ deleted: z.number() })

export class ElasticsearchStore implements DocumentStore {
  private static readonly DEFAULT_TIMEOUT = 30000

  private api: AxiosInstance
  private indexPrefix: string

  constructor(options: ElasticsearchStoreOptions) {
    this.indexPrefix = options.indexPrefix ?? ''
    this.api = axios.create({
      baseURL: options.url.replace(/\/$/, ''),
      timeout: options.timeoutMs ?? ElasticsearchStore.DEFAULT_TIMEOUT,
      auth:
        options.username !== undefined && options.password !== undefined
          ? { username: options.username, password: options.password }
          : undefined,
      headers: { Accept: 'application/json' },
      adapter: options.adapter,
    })
  }

  indexName(collection: CollectionName): string {
    return `${this.indexPrefix}${collection}`
  }

  async ping(): Promise<void> {
    try {
      await this.api.get('/')
    } catch (error) {
      const details = getAxiosErrorDetails(error)
      throw new Error(
        `Document store unreachable${details.status ? ` (HTTP ${details.status})` : ''}: ${details.message}`,
        { cause: error }
      )
    }
  }

  async ensureCollection(collection: CollectionName, mapping: CollectionMapping): Promise<void> {
    const index = this.indexName(collection)
    const head = await this.api.head(`/${encodeURIComponent(index)}`, {
      validateStatus: (status) => status === 200 || status === 404,
    })
    if (head.status === 200) {
      return
    }

    try {
      await this.api.put(`/${encodeURIComponent(index)}`, { mappings: mapping })
      console.log(`[ElasticsearchStore] Created index ${index}`)
    } catch (error) {
      const details = getAxiosErrorDetails(error)
      // Another writer created it between HEAD and PUT
      if (details.status === 400 && JSON.stringify(details.data ?? '').includes('resource_already_exists_exception')) {
        return
      }
      throw new Error(`Failed to create index ${index}: ${details.message}`, { cause: error })
    }
  }

  async bulkUpsert(collection: CollectionName, documents: StoreDocument[]): Promise<BulkUpsertResult> {
    if (documents.length === 0) {
      return { written: 0 }
    }

    const index = this.indexName(collection)
    const ids = documents.map((doc) => doc.id)
    const body =
      documents
        .map((doc) => `${JSON.stringify({ index: { _index: index, _id: doc.id } })}\n${JSON.stringify(doc.body)}`)
        .join('\n') + '\n'

    let data: unknown
    try {
      const response = await this.api.post('/_bulk', body, {
        headers: { 'Content-Type': 'application/x-ndjson' },
      })
      data = response.data
    } catch (error) {
      const details = getAxiosErrorDetails(error)
      throw new SinkWriteError(`Bulk request to ${index} failed: ${details.message}`, {
        collection,
        ids,
        retryable: isRetryableError(error, TRANSIENT_STATUSES),
        status: details.status,
        cause: error,
      })
    }

    const parsed = BulkResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new SinkWriteError(`Unexpected bulk response from ${index}`, { collection, ids, retryable: false })
    }

    const failures = parsed.data.items
      .map((item, position) => ({ id: item.index._id ?? ids[position], ...item.index }))
      .filter((item) => item.status >= 300 || item.error !== undefined)

    if (failures.length === 0 && parsed.data.items.length === documents.length) {
      return { written: documents.length }
    }

    if (failures.length === 0) {
      throw new SinkWriteError(
        `Bulk response from ${index} acknowledged ${parsed.data.items.length} of ${documents.length} documents`,
        { collection, ids, retryable: true }
      )
    }

    const first = failures[0]
    const reason = first.error ? `${first.error.type}: ${first.error.reason ?? 'no reason given'}` : `HTTP ${first.status}`
    throw new SinkWriteError(`${failures.length} of ${documents.length} documents rejected by ${index} (${reason})`, {
      collection,
      ids: failures.map((failure) => failure.id),
      retryable: failures.every((failure) => TRANSIENT_STATUSES.includes(failure.status)),
      status: first.status,
    })
  }

  async refresh(collection: CollectionName): Promise<void> {
    await this.api.post(`/${encodeURIComponent(this.indexName(collection))}/_refresh`)
  }

  async count(collection: CollectionName): Promise<number> {
    const response = await this.api.get(`/${encodeURIComponent(this.indexName(collection))}/_count`)
    return CountResponseSchema.parse(response.data).count
  }

  async deleteExcept(collection: CollectionName, keepIds: string[]): Promise<number> {
    const response = await this.api.post(
      `/${encodeURIComponent(this.indexName(collection))}/_delete_by_query`,
      { query: { bool: { must_not: { ids: { values: keepIds } } } } },
      { params: { refresh: true, conflicts: 'proceed' } }
    )
    return DeleteByQueryResponseSchema.parse(response.data).deleted
  }
}
