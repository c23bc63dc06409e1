/**
 * Error Handling Utilities
 *
 * Pipeline error taxonomy plus type-safe helpers used across services and the
 * document store client.
 */

import type { CollectionName, CollectionWriteResult } from '../../types/pipeline'

// ============================================================================
// ERROR TYPES
// ============================================================================

export type SourceReadErrorKind = 'missing' | 'unreadable' | 'malformed'

/**
 * The library export could not be loaded. Always fatal to a run.
 */
export class SourceReadError extends Error {
  readonly kind: SourceReadErrorKind
  readonly path: string

  constructor(kind: SourceReadErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SourceReadError'
    this.kind = kind
    this.path = path
  }
}

export interface SinkWriteErrorDetails {
  collection: CollectionName
  ids: string[]
  retryable: boolean
  status?: number
  /** What the collection write had done when a fail-fast abort stopped it */
  result?: CollectionWriteResult
  cause?: unknown
}

/**
 * A batch write to the document store failed.
 * `retryable` marks transient failures (connection, timeout, 429/5xx).
 */
export class SinkWriteError extends Error {
  readonly collection: CollectionName
  readonly ids: string[]
  readonly retryable: boolean
  readonly status: number | undefined
  readonly result: CollectionWriteResult | undefined

  constructor(message: string, details: SinkWriteErrorDetails) {
    super(message, { cause: details.cause })
    this.name = 'SinkWriteError'
    this.collection = details.collection
    this.ids = details.ids
    this.retryable = details.retryable
    this.status = details.status
    this.result = details.result
  }
}

/**
 * Invalid runtime configuration (environment or CLI flags)
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get a consistent error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Type guard for Node.js system errors (with code property)
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Type guard for Axios errors (with response property)
 */
export function isAxiosError(error: unknown): error is Error & { response?: { status: number; data?: unknown }; code?: string } {
  return error instanceof Error && 'isAxiosError' in error
}

/**
 * Extract axios error details for error handling
 * Returns response status, data, and message if available
 */
export function getAxiosErrorDetails(error: unknown): { status?: number; data?: unknown; message: string } {
  if (isAxiosError(error)) {
    return {
      status: error.response?.status,
      data: error.response?.data,
      message: error.message
    }
  }
  return { message: getErrorMessage(error) }
}

/**
 * Get error code for Node.js errors (ENOENT, ECONNREFUSED, etc.)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isNodeError(error)) {
    return error.code
  }
  return undefined
}
