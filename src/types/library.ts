/**
 * Library record types
 *
 * Raw values decoded from the property-list export, the normalized Track
 * record, and the Artist/Album/Genre summaries derived from it.
 */

// ============================================================================
// RAW EXPORT VALUES
// ============================================================================

export type PlistValue =
  | string
  | number
  | boolean
  | Date
  | PlistValue[]
  | PlistDict

export interface PlistDict {
  [key: string]: PlistValue
}

/** One entry of the export's "Tracks" dictionary, uninterpreted */
export interface RawTrackEntry {
  /** Key of the entry inside the "Tracks" dictionary */
  key: string
  entry: PlistDict
}

// ============================================================================
// TRACK
// ============================================================================

export interface Track {
  track_id: string
  persistent_id: string | null
  name: string | null
  artist: string | null
  album_artist: string | null
  album: string | null
  genre: string | null
  composer: string | null
  kind: string | null
  grouping: string | null
  comments: string | null
  location: string | null
  year: number | null
  bit_rate: number | null // kbps
  sample_rate: number | null // Hz
  play_count: number
  skip_count: number
  rating: number | null // 0-100
  rating_computed: boolean
  total_time_ms: number | null
  track_number: number | null
  disc_number: number | null
  bpm: number | null
  size_bytes: number | null
  compilation: boolean
  date_added: string | null // ISO-8601
  date_modified: string | null
  last_played: string | null
  release_date: string | null
}

// ============================================================================
// AGGREGATES
// ============================================================================

/** Album artist used for tracks without an artist */
export const UNKNOWN_ARTIST = 'Unknown Artist'
/** Album name used for tracks without an album */
export const UNKNOWN_ALBUM = 'Unknown Album'
/** Genre name used for tracks without a genre */
export const UNKNOWN_GENRE = 'Unknown Genre'

export interface ArtistSummary {
  name: string
  track_count: number
  total_play_count: number
  total_skip_count: number
  average_rating: number | null
  total_time_ms: number
  album_count: number
  genres: string[]
  first_added: string | null
  last_played: string | null
}

export interface AlbumSummary {
  name: string
  artist: string
  track_count: number
  year: number | null
  total_play_count: number
  average_rating: number | null
  total_time_ms: number
  average_bit_rate: number | null
  genres: string[]
  compilation: boolean
  first_added: string | null
  last_added: string | null
}

export interface GenreSummary {
  name: string
  artist_count: number
  album_count: number
  track_count: number
  total_play_count: number
  average_play_count: number
  average_rating: number | null
  average_bit_rate: number | null
  total_time_ms: number
}

export interface LibraryAggregates {
  artists: ArtistSummary[]
  albums: AlbumSummary[]
  genres: GenreSummary[]
}
