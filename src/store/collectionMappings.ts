/**
 * Field mappings for the four collections.
 *
 * Names are mapped as text with a keyword sub-field so dashboards can both
 * search and bucket on them.
 */

import type { CollectionMapping, FieldMapping } from './DocumentStore'
import type { CollectionName } from '../types/pipeline'

const searchableKeyword: FieldMapping = { type: 'text', fields: { keyword: { type: 'keyword' } } }
const keyword: FieldMapping = { type: 'keyword' }
const integer: FieldMapping = { type: 'integer' }
const long: FieldMapping = { type: 'long' }
const float: FieldMapping = { type: 'float' }
const boolean: FieldMapping = { type: 'boolean' }
const date: FieldMapping = { type: 'date' }

export const COLLECTION_MAPPINGS: Record<CollectionName, CollectionMapping> = {
  tracks: {
    properties: {
      track_id: keyword,
      persistent_id: keyword,
      name: searchableKeyword,
      artist: searchableKeyword,
      album_artist: searchableKeyword,
      album: searchableKeyword,
      genre: searchableKeyword,
      composer: searchableKeyword,
      kind: keyword,
      grouping: searchableKeyword,
      comments: { type: 'text' },
      location: keyword,
      year: integer,
      bit_rate: integer,
      sample_rate: integer,
      play_count: integer,
      skip_count: integer,
      rating: integer,
      rating_computed: boolean,
      total_time_ms: long,
      track_number: integer,
      disc_number: integer,
      bpm: integer,
      size_bytes: long,
      compilation: boolean,
      date_added: date,
      date_modified: date,
      last_played: date,
      release_date: date,
    },
  },
  artists: {
    properties: {
      name: searchableKeyword,
      track_count: integer,
      total_play_count: integer,
      total_skip_count: integer,
      average_rating: float,
      total_time_ms: long,
      album_count: integer,
      genres: searchableKeyword,
      first_added: date,
      last_played: date,
    },
  },
  albums: {
    properties: {
      name: searchableKeyword,
      artist: searchableKeyword,
      track_count: integer,
      year: integer,
      total_play_count: integer,
      average_rating: float,
      total_time_ms: long,
      average_bit_rate: float,
      genres: searchableKeyword,
      compilation: boolean,
      first_added: date,
      last_added: date,
    },
  },
  genres: {
    properties: {
      name: searchableKeyword,
      artist_count: integer,
      album_count: integer,
      track_count: integer,
      total_play_count: integer,
      average_play_count: float,
      average_rating: float,
      average_bit_rate: float,
      total_time_ms: long,
    },
  },
}
