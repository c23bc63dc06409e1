import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as path from 'path'
import { USAGE, main, parseCommandLine } from '../../src/cli'
import { ConfigError } from '../../src/services/utils/errorUtils'
import { InMemoryDocumentStore } from '../helpers/InMemoryDocumentStore'

const FIXTURES = path.join(__dirname, '..', 'fixtures')
const LIBRARY_PATH = path.join(FIXTURES, 'library.xml')
const NO_ENV_FILE = ['--env-file', path.join(FIXTURES, 'no-such.env')]

function captureStdout() {
  return vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
}

function captureStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
}

function written(spy: ReturnType<typeof captureStdout>): string {
  return spy.mock.calls.map((call) => String(call[0])).join('')
}

describe('cli', () => {
  describe('parseCommandLine', () => {
    it('should default to the run command', () => {
      expect(parseCommandLine([])).toEqual({
        command: 'run',
        help: false,
        envFile: '.env',
        logExport: undefined,
        overrides: {},
      })
    })

    it('should turn flags into configuration overrides', () => {
      const commandLine = parseCommandLine(['run', '--library', 'export.xml', '--fail-fast', '--prune', '-v'])

      expect(commandLine.overrides).toEqual({
        LIBRARY_PATH: 'export.xml',
        FAIL_FAST: 'true',
        PRUNE_STALE: 'true',
        LOG_LEVEL: 'verbose',
      })
    })

    it('should accept the inspect command', () => {
      expect(parseCommandLine(['inspect', '-l', 'export.xml'])).toMatchObject({
        command: 'inspect',
        overrides: { LIBRARY_PATH: 'export.xml' },
      })
    })

    it('should reject unknown commands and options', () => {
      expect(() => parseCommandLine(['sync'])).toThrow('Unknown command "sync"')
      expect(() => parseCommandLine(['run', 'extra'])).toThrow('Unexpected arguments: extra')
      expect(() => parseCommandLine(['--bogus'])).toThrow(ConfigError)
    })
  })

  describe('main', () => {
    let stderr: ReturnType<typeof captureStderr>

    beforeEach(() => {
      stderr = captureStderr()
    })

    it('should print usage for --help', async () => {
      const stdout = captureStdout()

      await expect(main(['--help'])).resolves.toBe(0)
      expect(stdout).toHaveBeenCalledWith(USAGE)
    })

    it('should exit with 2 for invalid arguments', async () => {
      await expect(main(['--bogus'])).resolves.toBe(2)
      expect(stderr).toHaveBeenCalledWith(USAGE)
    })

    it('should print an inspection report', async () => {
      const stdout = captureStdout()

      const exitCode = await main(['inspect', '--library', LIBRARY_PATH, ...NO_ENV_FILE])

      expect(exitCode).toBe(0)
      const report: unknown = JSON.parse(written(stdout))
      expect(report).toMatchObject({ trackCount: 6, playlistCount: 1, fieldCount: 22 })
    })

    it('should index the export and print the run summary', async () => {
      const stdout = captureStdout()
      const store = new InMemoryDocumentStore()

      const exitCode = await main(['run', '--library', LIBRARY_PATH, ...NO_ENV_FILE], { createStore: () => store })

      expect(exitCode).toBe(0)
      expect(await store.count('tracks')).toBe(4)
      const summary: unknown = JSON.parse(written(stdout))
      expect(summary).toMatchObject({ state: 'Completed', aggregates: { artists: 2, albums: 3, genres: 2 } })
    })

    it('should keep log lines off stdout', async () => {
      const stdout = captureStdout()

      await main(['run', '--library', LIBRARY_PATH, ...NO_ENV_FILE], { createStore: () => new InMemoryDocumentStore() })

      expect(stdout).toHaveBeenCalledTimes(1)
      expect(written(stdout)).toMatch(/^\{\n[\s\S]*\n\}\n$/)
      expect(stderr).toHaveBeenCalledWith(`[LibraryReader] Loaded ${LIBRARY_PATH}: 6 track entries\n`)
      expect(stderr).toHaveBeenCalledWith('[Pipeline] Reading → Normalizing\n')
    })

    it('should exit with 1 when some batches failed', async () => {
      captureStdout()
      const store = new InMemoryDocumentStore()
      store.failWhen({ matches: (collection) => collection === 'genres', retryable: false })

      const exitCode = await main(['--library', LIBRARY_PATH, ...NO_ENV_FILE], { createStore: () => store })

      expect(exitCode).toBe(1)
    })

    it('should exit with 2 when the export is missing', async () => {
      captureStdout()

      const exitCode = await main(['--library', path.join(FIXTURES, 'missing.xml'), ...NO_ENV_FILE], {
        createStore: () => new InMemoryDocumentStore(),
      })

      expect(exitCode).toBe(2)
    })
  })
})
