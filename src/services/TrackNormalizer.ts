/**
 * TrackNormalizer
 *
 * Converts raw "Tracks" entries into typed Track records. This is the only
 * place untyped export values are looked at; everything downstream works on
 * Track.
 *
 * Coercion rules:
 * - strings are trimmed, and absent or empty strings become null
 * - numbers accept plist integers/reals and numeric strings, truncated to
 *   integers; anything else falls back to the field default
 * - dates accept plist <date> values or parseable strings, stored as ISO-8601
 */

import type { PlistDict, PlistValue, RawTrackEntry, Track } from '../types/library'
import type { NormalizationTally, SkippedRecord, SkipReason } from '../types/pipeline'

// ============================================================================
// FIELD COERCION
// ============================================================================

export function coerceString(value: PlistValue | undefined): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed === '' ? null : trimmed
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  return null
}

export function coerceInteger(value: PlistValue | undefined): number | null {
  let numeric: number
  if (typeof value === 'number') {
    numeric = value
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value.trim())
  } else {
    return null
  }
  if (!Number.isFinite(numeric)) return null
  // Math.trunc(-0.5) is -0; normalize so serialized output stays "0"
  return Math.trunc(numeric) || 0
}

/** Integer >= 0, or null */
function coerceNonNegative(value: PlistValue | undefined): number | null {
  const numeric = coerceInteger(value)
  return numeric !== null && numeric >= 0 ? numeric : null
}

/** Integer > 0, or null. Exports write 0 for "not set" on year/track/disc/bpm. */
function coercePositive(value: PlistValue | undefined): number | null {
  const numeric = coerceInteger(value)
  return numeric !== null && numeric > 0 ? numeric : null
}

/** Non-negative counter defaulting to 0 */
function coerceCount(value: PlistValue | undefined): number {
  return coerceNonNegative(value) ?? 0
}

/** Rating on the export's 0-100 scale */
export function coerceRating(value: PlistValue | undefined): number | null {
  const numeric = coerceInteger(value)
  return numeric !== null && numeric >= 0 && numeric <= 100 ? numeric : null
}

export function coerceBoolean(value: PlistValue | undefined): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value !== 0
  if (typeof value === 'string') return value.trim().toLowerCase() === 'true'
  return false
}

export function coerceDate(value: PlistValue | undefined): string | null {
  let date: Date
  if (value instanceof Date) {
    date = value
  } else if (typeof value === 'string' && value.trim() !== '') {
    date = new Date(value.trim())
  } else {
    return null
  }
  return Number.isNaN(date.getTime()) ? null : date.toISOString()
}

// ============================================================================
// TRACK NORMALIZATION
// ============================================================================

export type NormalizeTrackResult =
  | { ok: true; track: Track }
  | { ok: false; reason: SkipReason; trackId: string | null }

/**
 * Normalize a single "Tracks" entry
 */
export function normalizeTrack(entry: PlistDict): NormalizeTrackResult {
  const get = (field: string): PlistValue | undefined =>
    Object.prototype.hasOwnProperty.call(entry, field) ? entry[field] : undefined

  const trackId = coerceString(get('Track ID'))
  if (trackId === null) {
    return { ok: false, reason: 'missing_id', trackId: null }
  }

  const name = coerceString(get('Name'))
  const artist = coerceString(get('Artist'))
  if (name === null && artist === null) {
    return { ok: false, reason: 'unusable', trackId }
  }

  const track: Track = {
    track_id: trackId,
    persistent_id: coerceString(get('Persistent ID')),
    name,
    artist,
    album_artist: coerceString(get('Album Artist')),
    album: coerceString(get('Album')),
    genre: coerceString(get('Genre')),
    composer: coerceString(get('Composer')),
    kind: coerceString(get('Kind')),
    grouping: coerceString(get('Grouping')),
    comments: coerceString(get('Comments')),
    location: coerceString(get('Location')),
    year: coercePositive(get('Year')),
    bit_rate: coerceNonNegative(get('Bit Rate')),
    sample_rate: coerceNonNegative(get('Sample Rate')),
    play_count: coerceCount(get('Play Count')),
    skip_count: coerceCount(get('Skip Count')),
    rating: coerceRating(get('Rating')),
    rating_computed: coerceBoolean(get('Rating Computed')),
    total_time_ms: coerceNonNegative(get('Total Time')),
    track_number: coercePositive(get('Track Number')),
    disc_number: coercePositive(get('Disc Number')),
    bpm: coercePositive(get('BPM')),
    size_bytes: coerceNonNegative(get('Size')),
    compilation: coerceBoolean(get('Compilation')),
    date_added: coerceDate(get('Date Added')),
    date_modified: coerceDate(get('Date Modified')),
    last_played: coerceDate(get('Play Date UTC')),
    release_date: coerceDate(get('Release Date')),
  }

  return { ok: true, track: Object.freeze(track) }
}

export interface NormalizationResult {
  /** Unique by track_id, in first-seen order */
  tracks: Track[]
  tally: NormalizationTally
  skipped: SkippedRecord[]
}

/**
 * Normalize every entry of an export.
 *
 * A track_id seen twice keeps the later entry (last write wins) at the
 * position of the first one, and counts towards `duplicate_ids`.
 */
export function normalizeTracks(entries: Iterable<RawTrackEntry>): NormalizationResult {
  const tally: NormalizationTally = {
    read: 0,
    normalized: 0,
    skipped_missing_id: 0,
    skipped_unusable: 0,
    duplicate_ids: 0,
  }
  const skipped: SkippedRecord[] = []
  const byId = new Map<string, Track>()

  for (const { key, entry } of entries) {
    tally.read++
    const result = normalizeTrack(entry)

    if (!result.ok) {
      if (result.reason === 'missing_id') {
        tally.skipped_missing_id++
      } else {
        tally.skipped_unusable++
      }
      skipped.push({ reason: result.reason, key, track_id: result.trackId })
      continue
    }

    tally.normalized++
    if (byId.has(result.track.track_id)) {
      tally.duplicate_ids++
      console.warn(`[TrackNormalizer] Duplicate track_id ${result.track.track_id} (entry "${key}"); keeping the later entry`)
    }
    byId.set(result.track.track_id, result.track)
  }

  if (skipped.length > 0) {
    console.warn(
      `[TrackNormalizer] Skipped ${skipped.length} entries ` +
        `(${tally.skipped_missing_id} without Track ID, ${tally.skipped_unusable} without name and artist)`
    )
  }
  console.log(`[TrackNormalizer] Normalized ${byId.size} tracks from ${tally.read} entries`)

  return { tracks: [...byId.values()], tally, skipped }
}
