/**
 * ConfigService - Resolves indexer configuration
 *
 * Sources, later ones winning: built-in defaults, an optional .env file,
 * the process environment, command-line overrides.
 */

import * as dotenv from 'dotenv'
import { EnvironmentSchema, EnvironmentShape, validateInput, type Environment } from '../validation/schemas'
import type { LogLevel } from './LoggingService'
import { ConfigError, getErrorCode, getErrorMessage } from './utils/errorUtils'

export interface IndexerConfig {
  libraryPath: string
  store: {
    url: string
    username?: string
    password?: string
    indexPrefix: string
    timeoutMs: number
  }
  writer: {
    batchSize: number
    concurrency: number
    failFast: boolean
    maxRetries: number
    initialDelayMs: number
    maxDelayMs: number
  }
  pruneStale: boolean
  logging: {
    level: LogLevel
    dir?: string
    retentionDays: number
  }
}

/** Raw string settings keyed by environment variable name */
export type ConfigOverrides = Partial<Record<keyof Environment, string>>

const SETTING_NAMES = Object.keys(EnvironmentShape.shape)

/**
 * Pick the known settings out of an environment, treating blank values as unset
 */
function pickSettings(env: NodeJS.ProcessEnv): Record<string, string> {
  const settings: Record<string, string> = {}
  for (const name of SETTING_NAMES) {
    const value = env[name]
    if (value !== undefined && value.trim() !== '') {
      settings[name] = value
    }
  }
  return settings
}

function toConfig(env: Environment): IndexerConfig {
  return {
    libraryPath: env.LIBRARY_PATH,
    store: {
      url: env.STORE_URL,
      username: env.STORE_USERNAME,
      password: env.STORE_PASSWORD,
      indexPrefix: env.STORE_INDEX_PREFIX,
      timeoutMs: env.STORE_TIMEOUT_MS,
    },
    writer: {
      batchSize: env.BATCH_SIZE,
      concurrency: env.WRITE_CONCURRENCY,
      failFast: env.FAIL_FAST,
      maxRetries: env.MAX_RETRIES,
      initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
    pruneStale: env.PRUNE_STALE,
    logging: {
      level: env.LOG_LEVEL,
      dir: env.LOG_DIR,
      retentionDays: env.LOG_RETENTION_DAYS,
    },
  }
}

/**
 * Build the configuration from an environment and command-line overrides
 *
 * @throws ConfigError when a setting is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): IndexerConfig {
  const settings = { ...pickSettings(env), ...pickSettings(overrides) }

  let parsed: Environment
  try {
    parsed = validateInput(EnvironmentSchema, settings, 'config')
  } catch (error) {
    throw new ConfigError(getErrorMessage(error), { cause: error })
  }
  return toConfig(parsed)
}

/**
 * Load a .env file into process.env without replacing variables already set.
 * A missing file is not an error.
 *
 * @returns true when a file was loaded
 */
export function loadEnvFile(filePath = '.env'): boolean {
  const result = dotenv.config({ path: filePath })
  if (result.error) {
    if (getErrorCode(result.error) === 'ENOENT') {
      return false
    }
    throw new ConfigError(`Could not load ${filePath}: ${result.error.message}`, { cause: result.error })
  }
  console.log(`[Config] Loaded environment from ${filePath}`)
  return true
}
