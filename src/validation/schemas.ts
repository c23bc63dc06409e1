/**
 * Zod Validation Schemas
 *
 * Runtime validation for configuration read from the environment and the
 * command line. Everything arrives as strings and is coerced here.
 */

import { z } from 'zod'

// ============================================================================
// COMMON SCHEMAS
// ============================================================================

export const LogLevelSchema = z.enum(['verbose', 'debug', 'info', 'warn', 'error'])

/**
 * File/folder path string — must be non-empty, reasonable length, no null bytes
 */
export const FilePathSchema = z.string().min(1).max(2000).refine(
  (val) => !val.includes('\0'),
  { message: 'Path must not contain null bytes' }
)

/**
 * Safe URL schema (only http/https)
 */
export const SafeUrlSchema = z.string().url().refine(
  (url) => {
    try {
      const parsed = new URL(url)
      return ['http:', 'https:'].includes(parsed.protocol)
    } catch {
      return false
    }
  },
  { message: 'URL must use http or https protocol' }
)

/**
 * Boolean flag written as true/false, 1/0 or yes/no (any case)
 */
export const BooleanFlagSchema = z
  .preprocess(
    (val) => (typeof val === 'string' ? val.trim().toLowerCase() : val),
    z.enum(['true', 'false', '1', '0', 'yes', 'no'])
  )
  .transform((val) => val === 'true' || val === '1' || val === 'yes')

/**
 * Integer within [min, max], read from a string
 */
function integerSetting(defaultValue: number, min: number, max: number) {
  return z.coerce.number().int().min(min).max(max).default(defaultValue)
}

/**
 * Index names must be lowercase in Elasticsearch
 */
export const IndexPrefixSchema = z
  .string()
  .max(100)
  .regex(/^[a-z0-9._-]*$/, 'Index prefix may only contain lowercase letters, digits, ".", "_" and "-"')

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Environment variables understood by the indexer
 */
export const EnvironmentShape = z.object({
  LIBRARY_PATH: FilePathSchema.default('iTunes Music Library.xml'),

  STORE_URL: SafeUrlSchema.default('http://localhost:9200'),
  STORE_USERNAME: z.string().min(1).max(200).optional(),
  STORE_PASSWORD: z.string().min(1).max(1000).optional(),
  STORE_INDEX_PREFIX: IndexPrefixSchema.default(''),
  STORE_TIMEOUT_MS: integerSetting(30000, 1000, 600000),

  BATCH_SIZE: integerSetting(500, 1, 10000),
  WRITE_CONCURRENCY: integerSetting(2, 1, 16),
  MAX_RETRIES: integerSetting(3, 0, 10),
  RETRY_INITIAL_DELAY_MS: integerSetting(1000, 0, 60000),
  RETRY_MAX_DELAY_MS: integerSetting(30000, 0, 600000),
  FAIL_FAST: BooleanFlagSchema.default('false'),
  PRUNE_STALE: BooleanFlagSchema.default('false'),

  LOG_LEVEL: z.preprocess(
    (val) => (typeof val === 'string' ? val.trim().toLowerCase() : val),
    LogLevelSchema.default('info')
  ),
  LOG_DIR: FilePathSchema.optional(),
  LOG_RETENTION_DAYS: integerSetting(7, 1, 365),
})

export const EnvironmentSchema = EnvironmentShape.refine(
  (env) => (env.STORE_USERNAME === undefined) === (env.STORE_PASSWORD === undefined),
  { message: 'STORE_USERNAME and STORE_PASSWORD must be set together', path: ['STORE_PASSWORD'] }
)

export type Environment = z.output<typeof EnvironmentSchema>

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Validate and parse input, throwing a descriptive error on failure
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, context?: string): T {
  const result = schema.safeParse(input)
  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')
    throw new Error(`${context ? `[${context}] ` : ''}Validation failed: ${errors}`)
  }
  return result.data
}
