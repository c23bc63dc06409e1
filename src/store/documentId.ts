import { createHash } from 'crypto'

/** Elasticsearch rejects document ids longer than this many bytes */
export const MAX_DOCUMENT_ID_BYTES = 512

/**
 * Deterministic document id for a logical key.
 *
 * Parts are URI-encoded and joined with "/", so ["AC/DC", "Back in Black"]
 * and ["AC", "DC/Back in Black"] stay distinct. Ids that would exceed the
 * store's limit are replaced by a SHA-256 digest of the same string.
 */
export function documentId(keyParts: readonly string[]): string {
  const id = keyParts.map((part) => encodeURIComponent(part)).join('/')
  if (Buffer.byteLength(id, 'utf8') <= MAX_DOCUMENT_ID_BYTES) {
    return id
  }
  return `sha256:${createHash('sha256').update(id).digest('hex')}`
}
