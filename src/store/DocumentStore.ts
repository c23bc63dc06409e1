/**
 * DocumentStore Interface
 *
 * The contract the pipeline needs from a document store. The Elasticsearch
 * client implements it over HTTP; tests use an in-process implementation.
 */

import type { CollectionName } from '../types/pipeline'

/** HTTP statuses from a store that mark a failure as transient */
export const TRANSIENT_STATUSES = [429, 502, 503, 504]

export interface StoreDocument {
  id: string
  body: object
}

export interface FieldMapping {
  type: 'keyword' | 'text' | 'integer' | 'long' | 'float' | 'boolean' | 'date'
  fields?: Record<string, FieldMapping>
}

export interface CollectionMapping {
  properties: Record<string, FieldMapping>
}

export interface BulkUpsertResult {
  /** Number of documents created or overwritten */
  written: number
}

export interface DocumentStore {
  /**
   * Verify the store is reachable
   * @throws when the store cannot be reached
   */
  ping(): Promise<void>

  /**
   * Create the collection with the given mapping if it does not exist.
   * Existing collections and their documents are left untouched.
   */
  ensureCollection(collection: CollectionName, mapping: CollectionMapping): Promise<void>

  /**
   * Insert or overwrite each document under its id.
   * @throws SinkWriteError when any document of the batch was not written;
   *   its `ids` name the rejected documents, the others were written
   */
  bulkUpsert(collection: CollectionName, documents: StoreDocument[]): Promise<BulkUpsertResult>

  /** Make recent writes visible to readers */
  refresh(collection: CollectionName): Promise<void>

  /** Number of documents in the collection */
  count(collection: CollectionName): Promise<number>

  /**
   * Delete every document whose id is not in `keepIds`
   * @returns number of documents deleted
   */
  deleteExcept(collection: CollectionName, keepIds: string[]): Promise<number>
}
