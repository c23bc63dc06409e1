/**
 * LibraryReader
 *
 * Loads a property-list library export and exposes its "Tracks" dictionary as
 * a lazy sequence of raw entries. Values are not interpreted here.
 */

import * as fs from 'fs/promises'
import {
  PlistDecodeError,
  decodePlistValue,
  parsePlistDocument,
  readDictEntries,
  type PlistNode,
} from './PlistDecoder'
import { SourceReadError, getErrorCode, getErrorMessage } from './utils/errorUtils'
import type { PlistDict, PlistValue, RawTrackEntry } from '../types/library'

export interface LibraryMetadata {
  majorVersion: number | null
  minorVersion: number | null
  applicationVersion: string | null
  libraryPersistentId: string | null
  date: string | null
}

export interface LibraryExport {
  path: string
  metadata: LibraryMetadata
  /** Keys of the top-level dictionary, in document order */
  topLevelKeys: string[]
  /** Number of entries in the "Tracks" dictionary */
  trackCount: number
  /** Number of elements in the "Playlists" array */
  playlistCount: number
  /** Decodes and yields each "Tracks" entry in document order */
  tracks(): Generator<RawTrackEntry>
}

function isPlistDict(value: PlistValue): value is PlistDict {
  return typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)
}

function readMetadata(entries: Map<string, PlistNode>): LibraryMetadata {
  const decode = (key: string): PlistValue | undefined => {
    const node = entries.get(key)
    return node ? decodePlistValue(node) : undefined
  }
  const asNumber = (value: PlistValue | undefined): number | null => (typeof value === 'number' ? value : null)
  const asString = (value: PlistValue | undefined): string | null => (typeof value === 'string' ? value : null)
  const date = decode('Date')

  return {
    majorVersion: asNumber(decode('Major Version')),
    minorVersion: asNumber(decode('Minor Version')),
    applicationVersion: asString(decode('Application Version')),
    libraryPersistentId: asString(decode('Library Persistent ID')),
    date: date instanceof Date ? date.toISOString() : null,
  }
}

async function readSource(filePath: string): Promise<string> {
  try {
    // readFile opens the file read-only and closes the handle before resolving
    return await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    const code = getErrorCode(error)
    if (code === 'ENOENT' || code === 'EISDIR' || code === 'ENOTDIR') {
      throw new SourceReadError('missing', filePath, `Library export not found: ${filePath}`, { cause: error })
    }
    throw new SourceReadError(
      'unreadable',
      filePath,
      `Library export could not be read: ${getErrorMessage(error)}`,
      { cause: error }
    )
  }
}

/**
 * Parse library export text. Exported for callers that already hold the XML.
 */
export function parseLibrary(xml: string, filePath: string): LibraryExport {
  const malformed = (error: unknown): SourceReadError =>
    new SourceReadError('malformed', filePath, `Library export is malformed: ${getErrorMessage(error)}`, { cause: error })

  let topLevel: Map<string, PlistNode>
  try {
    const root = parsePlistDocument(xml)
    if (root.tag !== 'dict') {
      throw new PlistDecodeError(`Top-level value must be a <dict>, found <${root.tag}>`)
    }
    topLevel = new Map(readDictEntries(root))
  } catch (error) {
    throw malformed(error)
  }

  let metadata: LibraryMetadata
  let trackEntries: Array<[string, PlistNode]> = []
  try {
    metadata = readMetadata(topLevel)
    const tracksNode = topLevel.get('Tracks')
    if (tracksNode) {
      if (tracksNode.tag !== 'dict') {
        throw new PlistDecodeError(`"Tracks" must be a <dict>, found <${tracksNode.tag}>`)
      }
      trackEntries = readDictEntries(tracksNode)
    } else {
      console.warn(`[LibraryReader] No "Tracks" dictionary in ${filePath}; the export has no tracks`)
    }
  } catch (error) {
    throw malformed(error)
  }

  const playlistsNode = topLevel.get('Playlists')

  return {
    path: filePath,
    metadata,
    topLevelKeys: [...topLevel.keys()],
    trackCount: trackEntries.length,
    playlistCount: playlistsNode?.tag === 'array' ? playlistsNode.children.length : 0,
    *tracks(): Generator<RawTrackEntry> {
      for (const [key, node] of trackEntries) {
        let entry: PlistValue
        try {
          entry = decodePlistValue(node)
        } catch (error) {
          throw malformed(new PlistDecodeError(`Track entry "${key}": ${getErrorMessage(error)}`))
        }
        if (!isPlistDict(entry)) {
          throw malformed(new PlistDecodeError(`Track entry "${key}" is not a <dict>`))
        }
        yield { key, entry }
      }
    },
  }
}

/**
 * Open a library export from disk
 *
 * @throws SourceReadError when the file is missing, unreadable or malformed
 */
export async function openLibrary(filePath: string): Promise<LibraryExport> {
  const xml = await readSource(filePath)
  const library = parseLibrary(xml, filePath)
  console.log(`[LibraryReader] Loaded ${filePath}: ${library.trackCount} track entries`)
  return library
}
