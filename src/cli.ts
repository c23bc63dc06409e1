/**
 * Command line front end
 *
 *   music-library-indexer [run] [--library <path>] [--fail-fast] [--prune] [--verbose]
 *   music-library-indexer inspect [--library <path>]
 *
 * Exit codes: 0 success, 1 some batches failed, 2 the run failed or the
 * configuration was invalid.
 */

import { parseArgs } from 'util'
import { loadConfig, loadEnvFile, type ConfigOverrides, type IndexerConfig } from './services/ConfigService'
import { inspectLibrary } from './services/LibraryInspector'
import { openLibrary } from './services/LibraryReader'
import { getLoggingService } from './services/LoggingService'
import { PipelineOrchestrator, exitCodeFor } from './services/PipelineOrchestrator'
import { ConfigError, SourceReadError, getErrorMessage } from './services/utils/errorUtils'
import type { DocumentStore } from './store/DocumentStore'
import { ElasticsearchStore } from './store/ElasticsearchStore'

export const USAGE = `Usage:
  music-library-indexer [run] [options]     Index a library export into the document store
  music-library-indexer inspect [options]   Report the fields found in a library export

Options:
  -l, --library <path>     Library export to read (env LIBRARY_PATH)
      --fail-fast          Abort on the first batch that cannot be written (env FAIL_FAST)
      --prune              Remove documents not produced by this run (env PRUNE_STALE)
  -v, --verbose            Log at verbose level (env LOG_LEVEL)
      --env-file <path>    Environment file to load (default: .env)
      --log-export <path>  Write the captured log of this session to a JSON file
  -h, --help               Show this help
`

export type Command = 'run' | 'inspect'

export interface CommandLine {
  command: Command
  help: boolean
  envFile: string
  logExport?: string
  overrides: ConfigOverrides
}

export interface CliDependencies {
  createStore?: (config: IndexerConfig) => DocumentStore
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      library: { type: 'string', short: 'l' },
      'fail-fast': { type: 'boolean' },
      prune: { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      'env-file': { type: 'string' },
      'log-export': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}

/**
 * @throws ConfigError for unknown commands or options
 */
export function parseCommandLine(argv: string[]): CommandLine {
  let parsed: ReturnType<typeof readArgs>
  try {
    parsed = readArgs(argv)
  } catch (error) {
    throw new ConfigError(getErrorMessage(error), { cause: error })
  }

  const { values, positionals } = parsed
  if (positionals.length > 1) {
    throw new ConfigError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`)
  }
  const [command = 'run'] = positionals
  if (command !== 'run' && command !== 'inspect') {
    throw new ConfigError(`Unknown command "${command}"`)
  }

  const overrides: ConfigOverrides = {}
  if (values.library !== undefined) overrides.LIBRARY_PATH = values.library
  if (values['fail-fast']) overrides.FAIL_FAST = 'true'
  if (values.prune) overrides.PRUNE_STALE = 'true'
  if (values.verbose) overrides.LOG_LEVEL = 'verbose'

  return {
    command,
    help: values.help ?? false,
    envFile: values['env-file'] ?? '.env',
    logExport: values['log-export'],
    overrides,
  }
}

function createElasticsearchStore(config: IndexerConfig): DocumentStore {
  return new ElasticsearchStore({
    url: config.store.url,
    username: config.store.username,
    password: config.store.password,
    indexPrefix: config.store.indexPrefix,
    timeoutMs: config.store.timeoutMs,
  })
}

async function runPipeline(config: IndexerConfig, createStore: (config: IndexerConfig) => DocumentStore): Promise<number> {
  const orchestrator = new PipelineOrchestrator(createStore(config), {
    libraryPath: config.libraryPath,
    pruneStale: config.pruneStale,
    ...config.writer,
  })
  const summary = await orchestrator.run()
  process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`)

  const exitCode = exitCodeFor(summary)
  console.log(
    `[CLI] Run ${summary.state.toLowerCase()} in ${summary.duration_ms}ms: ` +
      `${summary.tally.normalized} tracks, ${summary.failed_batches.length} failed batches (exit ${exitCode})`
  )
  return exitCode
}

async function runInspect(config: IndexerConfig): Promise<number> {
  try {
    const library = await openLibrary(config.libraryPath)
    const report = inspectLibrary(library)
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`)
    return 0
  } catch (error) {
    if (error instanceof SourceReadError) {
      console.error(`[CLI] ${error.message}`)
      return 2
    }
    throw error
  }
}

/**
 * Run the command line and resolve with the process exit code
 */
export async function main(argv: string[] = process.argv.slice(2), deps: CliDependencies = {}): Promise<number> {
  const logging = getLoggingService()
  let logExport: string | undefined

  try {
    const commandLine = parseCommandLine(argv)
    if (commandLine.help) {
      process.stdout.write(USAGE)
      return 0
    }
    logExport = commandLine.logExport

    loadEnvFile(commandLine.envFile)
    const config = loadConfig(process.env, commandLine.overrides)

    logging.initialize(config.logging.level)
    if (config.logging.dir) {
      await logging.initializeFileLogging({
        dir: config.logging.dir,
        minLevel: config.logging.level,
        retentionDays: config.logging.retentionDays,
      })
    }

    return commandLine.command === 'inspect'
      ? await runInspect(config)
      : await runPipeline(config, deps.createStore ?? createElasticsearchStore)
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[CLI] Invalid configuration: ${error.message}`)
      process.stderr.write(USAGE)
    } else {
      console.error('[CLI] Unexpected error:', error)
    }
    return 2
  } finally {
    if (logExport) {
      await logging.exportLogs(logExport)
    }
    await logging.shutdown()
  }
}
