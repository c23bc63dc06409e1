/**
 * LibraryAggregator
 *
 * Derives Artist, Album and Genre summaries from the complete Track set.
 * Pure: the same set of tracks gives the same output in any input order.
 * Sums are integer, averages are computed once at the end from those sums,
 * set-valued fields are sorted, and each result array is sorted by key.
 */

import {
  UNKNOWN_ALBUM,
  UNKNOWN_ARTIST,
  UNKNOWN_GENRE,
  type AlbumSummary,
  type ArtistSummary,
  type GenreSummary,
  type LibraryAggregates,
  type Track,
} from '../types/library'

// ============================================================================
// ACCUMULATORS
// ============================================================================

interface Totals {
  trackCount: number
  playCount: number
  timeMs: number
  ratingSum: number
  ratedCount: number
  bitRateSum: number
  bitRateCount: number
}

function emptyTotals(): Totals {
  return { trackCount: 0, playCount: 0, timeMs: 0, ratingSum: 0, ratedCount: 0, bitRateSum: 0, bitRateCount: 0 }
}

function addToTotals(totals: Totals, track: Track): void {
  totals.trackCount++
  totals.playCount += track.play_count
  totals.timeMs += track.total_time_ms ?? 0
  if (track.rating !== null) {
    totals.ratingSum += track.rating
    totals.ratedCount++
  }
  if (track.bit_rate !== null && track.bit_rate > 0) {
    totals.bitRateSum += track.bit_rate
    totals.bitRateCount++
  }
}

/** Mean of the collected values, null for an empty group */
function average(sum: number, count: number): number | null {
  return count === 0 ? null : sum / count
}

function minDate(current: string | null, candidate: string | null): string | null {
  if (candidate === null) return current
  return current === null || candidate < current ? candidate : current
}

function maxDate(current: string | null, candidate: string | null): string | null {
  if (candidate === null) return current
  return current === null || candidate > current ? candidate : current
}

function sorted(values: Set<string>): string[] {
  return [...values].sort(compareKeys)
}

/** Code-unit comparison; locale-independent so output is stable across hosts */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Most frequent year; ties resolve to the earliest year
 */
export function modeYear(years: Map<number, number>): number | null {
  let best: number | null = null
  let bestCount = 0
  for (const [year, count] of years) {
    if (count > bestCount || (count === bestCount && best !== null && year < best)) {
      best = year
      bestCount = count
    }
  }
  return best
}

interface ArtistAccumulator {
  totals: Totals
  skipCount: number
  albums: Set<string>
  genres: Set<string>
  firstAdded: string | null
  lastPlayed: string | null
}

interface AlbumAccumulator {
  name: string
  artist: string
  totals: Totals
  years: Map<number, number>
  genres: Set<string>
  compilation: boolean
  firstAdded: string | null
  lastAdded: string | null
}

interface GenreAccumulator {
  totals: Totals
  artists: Set<string>
  albums: Set<string>
}

/** Map key for an (artist, album) pair; the separator cannot occur in trimmed names */
function albumGroupKey(artist: string, album: string): string {
  return `${artist}\u0000${album}`
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key)
  if (value === undefined) {
    value = create()
    map.set(key, value)
  }
  return value
}

// ============================================================================
// AGGREGATION
// ============================================================================

/**
 * Compute artist, album and genre summaries.
 *
 * - Artists: grouped by exact artist name; tracks without an artist are left out.
 * - Albums: grouped by (artist, album), with "Unknown Artist" and "Unknown Album"
 *   standing in for missing values.
 * - Genres: grouped by genre name, "Unknown Genre" for tracks without one.
 *
 * Every track is counted in exactly one album and one genre.
 */
export function aggregateLibrary(tracks: readonly Track[]): LibraryAggregates {
  const artists = new Map<string, ArtistAccumulator>()
  const albums = new Map<string, AlbumAccumulator>()
  const genres = new Map<string, GenreAccumulator>()

  for (const track of tracks) {
    const albumArtist = track.artist ?? UNKNOWN_ARTIST
    const album = track.album ?? UNKNOWN_ALBUM
    const genre = track.genre ?? UNKNOWN_GENRE
    const albumKey = albumGroupKey(albumArtist, album)

    if (track.artist !== null) {
      const acc = getOrCreate(artists, track.artist, () => ({
        totals: emptyTotals(),
        skipCount: 0,
        albums: new Set<string>(),
        genres: new Set<string>(),
        firstAdded: null,
        lastPlayed: null,
      }))
      addToTotals(acc.totals, track)
      acc.skipCount += track.skip_count
      acc.albums.add(album)
      acc.genres.add(genre)
      acc.firstAdded = minDate(acc.firstAdded, track.date_added)
      acc.lastPlayed = maxDate(acc.lastPlayed, track.last_played)
    }

    const albumAcc = getOrCreate(albums, albumKey, () => ({
      name: album,
      artist: albumArtist,
      totals: emptyTotals(),
      years: new Map<number, number>(),
      genres: new Set<string>(),
      compilation: false,
      firstAdded: null,
      lastAdded: null,
    }))
    addToTotals(albumAcc.totals, track)
    if (track.year !== null) albumAcc.years.set(track.year, (albumAcc.years.get(track.year) ?? 0) + 1)
    albumAcc.genres.add(genre)
    albumAcc.compilation = albumAcc.compilation || track.compilation
    albumAcc.firstAdded = minDate(albumAcc.firstAdded, track.date_added)
    albumAcc.lastAdded = maxDate(albumAcc.lastAdded, track.date_added)

    const genreAcc = getOrCreate(genres, genre, () => ({
      totals: emptyTotals(),
      artists: new Set<string>(),
      albums: new Set<string>(),
    }))
    addToTotals(genreAcc.totals, track)
    if (track.artist !== null) genreAcc.artists.add(track.artist)
    genreAcc.albums.add(albumKey)
  }

  const artistSummaries: ArtistSummary[] = [...artists.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([name, acc]) => ({
      name,
      track_count: acc.totals.trackCount,
      total_play_count: acc.totals.playCount,
      total_skip_count: acc.skipCount,
      average_rating: average(acc.totals.ratingSum, acc.totals.ratedCount),
      total_time_ms: acc.totals.timeMs,
      album_count: acc.albums.size,
      genres: sorted(acc.genres),
      first_added: acc.firstAdded,
      last_played: acc.lastPlayed,
    }))

  const albumSummaries: AlbumSummary[] = [...albums.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([, acc]) => ({
      name: acc.name,
      artist: acc.artist,
      track_count: acc.totals.trackCount,
      year: modeYear(acc.years),
      total_play_count: acc.totals.playCount,
      average_rating: average(acc.totals.ratingSum, acc.totals.ratedCount),
      total_time_ms: acc.totals.timeMs,
      average_bit_rate: average(acc.totals.bitRateSum, acc.totals.bitRateCount),
      genres: sorted(acc.genres),
      compilation: acc.compilation,
      first_added: acc.firstAdded,
      last_added: acc.lastAdded,
    }))

  const genreSummaries: GenreSummary[] = [...genres.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([name, acc]) => ({
      name,
      artist_count: acc.artists.size,
      album_count: acc.albums.size,
      track_count: acc.totals.trackCount,
      total_play_count: acc.totals.playCount,
      // Every genre group has at least one track
      average_play_count: acc.totals.playCount / acc.totals.trackCount,
      average_rating: average(acc.totals.ratingSum, acc.totals.ratedCount),
      average_bit_rate: average(acc.totals.bitRateSum, acc.totals.bitRateCount),
      total_time_ms: acc.totals.timeMs,
    }))

  console.log(
    `[LibraryAggregator] ${artistSummaries.length} artists, ${albumSummaries.length} albums, ` +
      `${genreSummaries.length} genres from ${tracks.length} tracks`
  )

  return { artists: artistSummaries, albums: albumSummaries, genres: genreSummaries }
}
