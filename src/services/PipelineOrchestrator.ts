/**
 * PipelineOrchestrator - Runs one ingestion of a library export
 *
 * Stages run strictly one after another, each on the complete output of the
 * previous one:
 *
 *   NotStarted → Reading → Normalizing → Aggregating → Writing → Completed
 *
 * A source error in Reading, or a fatal store error in Writing (store
 * unreachable, collection setup failing, a batch failing in fail-fast mode),
 * ends the run in Failed. Every run ends with a RunSummary.
 */

import { aggregateLibrary } from './LibraryAggregator'
import { openLibrary } from './LibraryReader'
import { SinkWriter, type KeyOf, type SinkWriterOptions } from './SinkWriter'
import { normalizeTracks } from './TrackNormalizer'
import { SinkWriteError, SourceReadError, getErrorMessage } from './utils/errorUtils'
import { isRetryableError, retryWithBackoff } from './utils/retryWithBackoff'
import { COLLECTION_MAPPINGS } from '../store/collectionMappings'
import { TRANSIENT_STATUSES, type DocumentStore } from '../store/DocumentStore'
import { documentId } from '../store/documentId'
import { COLLECTION_NAMES } from '../types/pipeline'
import type {
  CollectionName,
  CollectionWriteResult,
  NormalizationTally,
  PipelineState,
  RunSummary,
  SkippedRecord,
} from '../types/pipeline'
import type { AlbumSummary, ArtistSummary, GenreSummary, LibraryAggregates, RawTrackEntry, Track } from '../types/library'

export interface PipelineOptions extends SinkWriterOptions {
  libraryPath: string
  /** Remove documents not produced by this run (default: false) */
  pruneStale?: boolean
  onStateChange?: (state: PipelineState, previous: PipelineState) => void
}

const TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  NotStarted: ['Reading'],
  Reading: ['Normalizing', 'Failed'],
  Normalizing: ['Aggregating'],
  Aggregating: ['Writing'],
  Writing: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
}

export const TRACK_KEY: KeyOf<Track> = (track) => [track.track_id]
export const ARTIST_KEY: KeyOf<ArtistSummary> = (artist) => [artist.name]
export const ALBUM_KEY: KeyOf<AlbumSummary> = (album) => [album.artist, album.name]
export const GENRE_KEY: KeyOf<GenreSummary> = (genre) => [genre.name]

/**
 * Store errors worth retrying. Store clients wrap transport errors, so the
 * cause is checked as well.
 */
export function isTransientStoreError(error: unknown): boolean {
  if (isRetryableError(error, TRANSIENT_STATUSES)) return true
  return error instanceof Error && error.cause !== undefined && isRetryableError(error.cause, TRANSIENT_STATUSES)
}

function emptyTally(): NormalizationTally {
  return { read: 0, normalized: 0, skipped_missing_id: 0, skipped_unusable: 0, duplicate_ids: 0 }
}

/**
 * Exit code for a finished run: 0 on full success, 1 when some batches could
 * not be written, 2 when the run failed.
 */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.state === 'Failed') return 2
  return summary.failed_batches.length > 0 ? 1 : 0
}

export class PipelineOrchestrator {
  private state: PipelineState = 'NotStarted'
  private readonly writer: SinkWriter

  private tally: NormalizationTally = emptyTally()
  private skipped: SkippedRecord[] = []
  private aggregateCounts = { artists: 0, albums: 0, genres: 0 }
  private writes: CollectionWriteResult[] = []

  constructor(
    private readonly store: DocumentStore,
    private readonly options: PipelineOptions
  ) {
    this.writer = new SinkWriter(store, options)
  }

  getState(): PipelineState {
    return this.state
  }

  private transition(next: PipelineState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.state} → ${next}`)
    }
    const previous = this.state
    this.state = next
    console.log(`[Pipeline] ${previous} → ${next}`)
    this.options.onStateChange?.(next, previous)
  }

  /**
   * Execute the pipeline. Never rejects for source or store failures; those
   * are reported in the summary with state "Failed".
   */
  async run(): Promise<RunSummary> {
    if (this.state !== 'NotStarted') {
      throw new Error('A pipeline instance can only be run once')
    }

    const startedAt = new Date()

    // Reading
    this.transition('Reading')
    let entries: RawTrackEntry[]
    try {
      const library = await openLibrary(this.options.libraryPath)
      entries = Array.from(library.tracks())
    } catch (error) {
      if (error instanceof SourceReadError) {
        console.error(`[Pipeline] Source read failed (${error.kind}): ${error.message}`)
        this.transition('Failed')
        return this.summarize(startedAt, error.message)
      }
      throw error
    }

    // Normalizing
    this.transition('Normalizing')
    const { tracks, tally, skipped } = normalizeTracks(entries)
    this.tally = tally
    this.skipped = skipped

    // Aggregating
    this.transition('Aggregating')
    const aggregates = aggregateLibrary(tracks)
    this.aggregateCounts = {
      artists: aggregates.artists.length,
      albums: aggregates.albums.length,
      genres: aggregates.genres.length,
    }

    // Writing
    this.transition('Writing')
    try {
      await this.writeAll(tracks, aggregates)
    } catch (error) {
      console.error(`[Pipeline] Write stage failed: ${getErrorMessage(error)}`)
      if (error instanceof SinkWriteError && error.result) {
        this.writes.push(error.result)
      }
      this.transition('Failed')
      return this.summarize(startedAt, getErrorMessage(error))
    }

    this.transition('Completed')
    return this.summarize(startedAt, null)
  }

  private async writeAll(tracks: readonly Track[], aggregates: LibraryAggregates): Promise<void> {
    await this.withStoreRetry('ping', () => this.store.ping())
    for (const collection of COLLECTION_NAMES) {
      await this.withStoreRetry(`ensure ${collection}`, () =>
        this.store.ensureCollection(collection, COLLECTION_MAPPINGS[collection])
      )
    }

    await this.writeCollection('tracks', tracks, TRACK_KEY)
    await this.writeCollection('artists', aggregates.artists, ARTIST_KEY)
    await this.writeCollection('albums', aggregates.albums, ALBUM_KEY)
    await this.writeCollection('genres', aggregates.genres, GENRE_KEY)
  }

  private async writeCollection<T extends object>(
    collection: CollectionName,
    records: readonly T[],
    keyOf: KeyOf<T>
  ): Promise<void> {
    const result = await this.writer.write(collection, records, keyOf)

    if (this.options.pruneStale) {
      if (result.failed_batches.length === 0) {
        const keepIds = records.map((record) => documentId(keyOf(record)))
        result.pruned = await this.store.deleteExcept(collection, keepIds)
        if (result.pruned > 0) {
          console.log(`[Pipeline] Pruned ${result.pruned} stale documents from ${collection}`)
        }
      } else {
        console.warn(`[Pipeline] Not pruning ${collection}: ${result.failed_batches.length} batches failed`)
      }
    }

    await this.withStoreRetry(`refresh ${collection}`, () => this.store.refresh(collection))
    result.stored = await this.withStoreRetry(`count ${collection}`, () => this.store.count(collection))
    console.log(`[Pipeline] ${collection}: ${result.written} documents written, ${result.stored} stored`)
    this.writes.push(result)
  }

  /**
   * Run a store call with the writer's retry settings
   */
  private withStoreRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(fn, {
      maxRetries: this.options.maxRetries,
      initialDelay: this.options.initialDelayMs,
      maxDelay: this.options.maxDelayMs,
      jitter: this.options.jitter,
      isRetryable: isTransientStoreError,
      onRetry: (attempt, error, delay) => {
        console.warn(`[Pipeline] Store ${operation}: retry ${attempt} in ${delay}ms after: ${error.message}`)
      },
    })
  }

  private summarize(startedAt: Date, error: string | null): RunSummary {
    if (this.state !== 'Completed' && this.state !== 'Failed') {
      throw new Error(`Cannot summarize a run in state ${this.state}`)
    }
    const finishedAt = new Date()
    return {
      state: this.state,
      started_at: startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      duration_ms: finishedAt.getTime() - startedAt.getTime(),
      source: this.options.libraryPath,
      tally: { ...this.tally },
      skipped: [...this.skipped],
      aggregates: { ...this.aggregateCounts },
      writes: [...this.writes],
      failed_batches: this.writes.flatMap((write) => write.failed_batches),
      error,
    }
  }
}
