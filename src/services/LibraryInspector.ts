/**
 * LibraryInspector
 *
 * Surveys the structure of an export before ingestion: which fields the track
 * entries carry, how often, with which value types, and a few example values.
 */

import type { LibraryExport } from './LibraryReader'
import type { PlistValue } from '../types/library'
import { compareKeys } from './LibraryAggregator'

export type ValueType = 'string' | 'integer' | 'real' | 'boolean' | 'date' | 'array' | 'dict'

/** Occurrences per value type, keys in name order */
export type TypeHistogram = Partial<Record<ValueType, number>>

export interface FieldReport {
  name: string
  count: number
  /** Share of track entries carrying the field, 0-100 */
  percentage: number
  types: TypeHistogram
  examples: string[]
}

export interface LibraryReport {
  path: string
  topLevelKeys: string[]
  trackCount: number
  playlistCount: number
  fieldCount: number
  /** Most common first; equal counts by name */
  fields: FieldReport[]
}

/**
 * Type of a decoded value. <data> decodes to its base64 text and so reports
 * as string; a <real> with an integral value reports as integer.
 */
export function valueTypeOf(value: PlistValue): ValueType {
  if (typeof value === 'string') return 'string'
  if (typeof value === 'boolean') return 'boolean'
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'real'
  if (value instanceof Date) return 'date'
  if (Array.isArray(value)) return 'array'
  return 'dict'
}

function describe(value: PlistValue): string {
  if (value instanceof Date) return value.toISOString()
  if (Array.isArray(value)) return `<array of size ${value.length}>`
  if (typeof value === 'object') return `<dict of size ${Object.keys(value).length}>`
  return String(value)
}

interface FieldStats {
  count: number
  types: Map<ValueType, number>
  examples: string[]
}

function toHistogram(counts: Map<ValueType, number>): TypeHistogram {
  const histogram: TypeHistogram = {}
  for (const type of [...counts.keys()].sort(compareKeys)) {
    histogram[type] = counts.get(type)
  }
  return histogram
}

export function inspectLibrary(library: LibraryExport, maxExamples = 3): LibraryReport {
  const stats = new Map<string, FieldStats>()
  let trackCount = 0

  for (const { entry } of library.tracks()) {
    trackCount++
    for (const [field, value] of Object.entries(entry)) {
      let fieldStats = stats.get(field)
      if (!fieldStats) {
        fieldStats = { count: 0, types: new Map(), examples: [] }
        stats.set(field, fieldStats)
      }
      fieldStats.count++
      const type = valueTypeOf(value)
      fieldStats.types.set(type, (fieldStats.types.get(type) ?? 0) + 1)
      const example = describe(value)
      if (fieldStats.examples.length < maxExamples && !fieldStats.examples.includes(example)) {
        fieldStats.examples.push(example)
      }
    }
  }

  const fields: FieldReport[] = [...stats.entries()]
    .map(([name, field]) => ({
      name,
      count: field.count,
      percentage: trackCount === 0 ? 0 : Math.round((field.count / trackCount) * 10000) / 100,
      types: toHistogram(field.types),
      examples: field.examples,
    }))
    .sort((a, b) => b.count - a.count || compareKeys(a.name, b.name))

  return {
    path: library.path,
    topLevelKeys: library.topLevelKeys,
    trackCount,
    playlistCount: library.playlistCount,
    fieldCount: fields.length,
    fields,
  }
}
