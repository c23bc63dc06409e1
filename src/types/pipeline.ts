/**
 * Pipeline run types
 */

export const COLLECTION_NAMES = ['tracks', 'artists', 'albums', 'genres'] as const

export type CollectionName = (typeof COLLECTION_NAMES)[number]

export type PipelineState =
  | 'NotStarted'
  | 'Reading'
  | 'Normalizing'
  | 'Aggregating'
  | 'Writing'
  | 'Completed'
  | 'Failed'

export type SkipReason = 'missing_id' | 'unusable'

export interface SkippedRecord {
  reason: SkipReason
  /** Key of the entry in the export's "Tracks" dictionary */
  key: string
  track_id: string | null
}

export interface NormalizationTally {
  read: number
  normalized: number
  skipped_missing_id: number
  skipped_unusable: number
  /** Records replaced by a later entry carrying the same track_id */
  duplicate_ids: number
}

export interface FailedBatch {
  collection: CollectionName
  batch_index: number
  ids: string[]
  error: string
}

export interface CollectionWriteResult {
  collection: CollectionName
  attempted: number
  written: number
  pruned: number
  /** Documents in the collection after the write, or null when not counted */
  stored: number | null
  failed_batches: FailedBatch[]
}

export interface RunSummary {
  state: Extract<PipelineState, 'Completed' | 'Failed'>
  started_at: string
  finished_at: string
  duration_ms: number
  source: string
  tally: NormalizationTally
  skipped: SkippedRecord[]
  aggregates: { artists: number; albums: number; genres: number }
  writes: CollectionWriteResult[]
  failed_batches: FailedBatch[]
  error: string | null
}
