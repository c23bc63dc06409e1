/**
 * PlistDecoder
 *
 * Decodes XML property lists into plain values. The XML itself is parsed by
 * fast-xml-parser in order-preserving mode, which keeps the key/value
 * alternation of <dict> children intact:
 *
 *   [ { plist: [ { dict: [ { key: [{ '#text': 'Tracks' }] }, { dict: [...] } ] } ] } ]
 *
 * Values can be decoded eagerly (decodePlistValue) or a <dict> can be split
 * into undecoded key/node pairs (readDictEntries) so that large dictionaries
 * are decoded one entry at a time.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { PlistDict, PlistValue } from '../types/library'

export class PlistDecodeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PlistDecodeError'
  }
}

/** An element of the order-preserving parse tree */
export interface PlistNode {
  tag: string
  children: unknown[]
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false, // Keep text as written; typing comes from the element name
  trimValues: true,
  // Entities are decoded by decodeEntities; letting the parser do it as well
  // would decode "&#38;amp;" twice
  processEntities: false,
  htmlEntities: false,
})

const XML_ENTITIES: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'" }
const ENTITY_PATTERN = /&(?:#(\d+)|#x([0-9a-fA-F]+)|(amp|lt|gt|quot|apos));/g

/**
 * Decode the five XML entities and numeric character references in a single
 * pass. Library exports escape '&' as &#38;.
 */
export function decodeEntities(text: string): string {
  return text.replace(ENTITY_PATTERN, (match, decimal?: string, hex?: string, named?: string) => {
    if (named !== undefined) {
      return XML_ENTITIES[named] ?? match
    }
    const codePoint = decimal !== undefined ? parseInt(decimal, 10) : parseInt(hex ?? '', 16)
    return Number.isInteger(codePoint) && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match
  })
}

const INTEGER_PATTERN = /^[+-]?\d+$/

/**
 * Convert a raw fast-xml-parser node into a PlistNode
 */
export function toPlistNode(raw: unknown): PlistNode {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new PlistDecodeError('Expected an element node')
  }

  const entries: [string, unknown][] = Object.entries(raw)
  for (const [tag, children] of entries) {
    if (tag === ':@') continue
    if (tag === '#text') {
      throw new PlistDecodeError(`Unexpected text content "${String(children).slice(0, 40)}"`)
    }
    return { tag, children: Array.isArray(children) ? children : [] }
  }

  throw new PlistDecodeError('Empty element node')
}

function textOf(node: PlistNode): string {
  let text = ''
  for (const child of node.children) {
    if (typeof child === 'object' && child !== null && '#text' in child) {
      text += decodeEntities(String(child['#text']))
    } else {
      throw new PlistDecodeError(`<${node.tag}> must contain only text`)
    }
  }
  return text
}

/**
 * Parse an XML property list and return the node of its single root value
 */
export function parsePlistDocument(xml: string): PlistNode {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    const { msg, line, col } = validation.err
    throw new PlistDecodeError(`Invalid XML at line ${line}, column ${col}: ${msg}`)
  }

  const parsed: unknown = parser.parse(xml)
  if (!Array.isArray(parsed)) {
    throw new PlistDecodeError('Unexpected parser output')
  }

  const plist = parsed.map(toPlistNode).find((node) => node.tag === 'plist')
  if (!plist) {
    throw new PlistDecodeError('Missing <plist> root element')
  }
  if (plist.children.length !== 1) {
    throw new PlistDecodeError(`<plist> must contain exactly one value, found ${plist.children.length}`)
  }

  return toPlistNode(plist.children[0])
}

/**
 * Split a <dict> node into [key, value node] pairs without decoding the values.
 * Later duplicates of a key are kept; callers decide which one wins.
 */
export function readDictEntries(node: PlistNode): Array<[string, PlistNode]> {
  if (node.tag !== 'dict') {
    throw new PlistDecodeError(`Expected <dict>, found <${node.tag}>`)
  }

  const entries: Array<[string, PlistNode]> = []
  let pendingKey: string | null = null

  for (const raw of node.children) {
    const child = toPlistNode(raw)
    if (child.tag === 'key') {
      if (pendingKey !== null) {
        throw new PlistDecodeError(`Key "${pendingKey}" has no value`)
      }
      pendingKey = textOf(child)
      continue
    }
    if (pendingKey === null) {
      throw new PlistDecodeError(`<${child.tag}> inside <dict> is not preceded by a <key>`)
    }
    entries.push([pendingKey, child])
    pendingKey = null
  }

  if (pendingKey !== null) {
    throw new PlistDecodeError(`Key "${pendingKey}" has no value`)
  }

  return entries
}

export function decodePlistDict(node: PlistNode): PlistDict {
  const dict: PlistDict = {}
  for (const [key, valueNode] of readDictEntries(node)) {
    // defineProperty so that keys such as "__proto__" stay plain own properties
    Object.defineProperty(dict, key, {
      value: decodePlistValue(valueNode),
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }
  return dict
}

/**
 * Decode a value node into its JavaScript representation
 */
export function decodePlistValue(node: PlistNode): PlistValue {
  switch (node.tag) {
    case 'dict':
      return decodePlistDict(node)

    case 'array':
      return node.children.map((child) => decodePlistValue(toPlistNode(child)))

    case 'string':
      return textOf(node)

    case 'integer': {
      const text = textOf(node)
      if (!INTEGER_PATTERN.test(text)) {
        throw new PlistDecodeError(`Invalid <integer> value "${text}"`)
      }
      return Number(text)
    }

    case 'real': {
      const text = textOf(node)
      const value = Number(text)
      if (text === '' || Number.isNaN(value)) {
        throw new PlistDecodeError(`Invalid <real> value "${text}"`)
      }
      return value
    }

    case 'true':
      return true

    case 'false':
      return false

    case 'date': {
      const text = textOf(node)
      const date = new Date(text)
      if (Number.isNaN(date.getTime())) {
        throw new PlistDecodeError(`Invalid <date> value "${text}"`)
      }
      return date
    }

    case 'data':
      // Base64 payload; line breaks inside the element are not significant
      return textOf(node).replace(/\s+/g, '')

    default:
      throw new PlistDecodeError(`Unsupported element <${node.tag}>`)
  }
}

/**
 * Decode a complete XML property list
 */
export function decodePlist(xml: string): PlistValue {
  return decodePlistValue(parsePlistDocument(xml))
}
