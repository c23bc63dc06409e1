/**
 * LoggingService - Centralized logging with buffer, level filtering and log files
 *
 * Features:
 * - Intercepts console.log/warn/error/info/debug
 * - Passes entries at or above the configured level through to stderr, leaving
 *   stdout to command output
 * - Keeps recent entries in bounded buffers (warnings and errors kept longer)
 * - Optionally appends to daily log files with retention-based cleanup
 * - Exports the captured session to a JSON file
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import * as os from 'os'
import { format } from 'util'

export type LogLevel = 'verbose' | 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  id: string
  timestamp: string
  level: LogLevel
  source: string // e.g., "[SinkWriter]", "[Pipeline]"
  message: string
  details?: string // Stringified additional args
}

export interface FileLoggingOptions {
  dir: string
  minLevel?: LogLevel
  retentionDays?: number
}

const MAX_INFO_ENTRIES = 2000
const MAX_IMPORTANT_ENTRIES = 500
const LOG_FILE_PREFIX = 'library-indexer-'

type ConsoleMethod = 'log' | 'warn' | 'error' | 'info' | 'debug'

export class LoggingService {
  private infoLogs: LogEntry[] = [] // Circular buffer for info/debug/verbose
  private importantLogs: LogEntry[] = [] // Protected buffer for warn/error
  private sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`
  private startedAt = new Date()
  private consoleMinLevel: LogLevel = 'info'
  private intercepting = false
  private homeDir = os.homedir()
  private originalConsole: Record<ConsoleMethod, (...args: unknown[]) => void>

  // File logging
  private fileLoggingEnabled = false
  private fileLoggingMinLevel: LogLevel = 'info'
  private logRetentionDays = 7
  private logDir = ''
  private writeBuffer: string[] = []
  private flushTimer: NodeJS.Timeout | null = null
  private isWriting = false
  private currentLogDate = ''

  private static readonly LEVEL_PRIORITY: Record<LogLevel, number> = {
    verbose: 0, debug: 1, info: 2, warn: 3, error: 4,
  }
  private static readonly FLUSH_INTERVAL_MS = 5000
  private static readonly FLUSH_BUFFER_SIZE = 50

  constructor() {
    // Store original console methods
    this.originalConsole = {
      log: console.log.bind(console),
      warn: console.warn.bind(console),
      error: console.error.bind(console),
      info: console.info.bind(console),
      debug: console.debug.bind(console),
    }
  }

  /** Replace the user's home directory with ~ so paths in logs don't carry the OS username */
  private sanitize(text: string): string {
    if (!this.homeDir || this.homeDir === '/') return text
    return text.split(this.homeDir).join('~')
  }

  initialize(minLevel: LogLevel = 'info'): void {
    this.consoleMinLevel = minLevel
    this.interceptConsole()
    this.addEntry('info', '[LoggingService]', `Logging service initialized (level ${minLevel})`)
  }

  private interceptConsole(): void {
    if (this.intercepting) return
    this.intercepting = true

    const route = (level: LogLevel) => (...args: unknown[]) => {
      if (this.isEnabled(level, this.consoleMinLevel)) {
        this.writeTerminal(format(...args))
      }
      this.captureLog(level, args)
    }
    console.log = route('info')
    console.warn = route('warn')
    console.error = route('error')
    console.info = route('info')
    console.debug = route('debug')
  }

  private writeTerminal(line: string): void {
    process.stderr.write(`${line}\n`)
  }

  private restoreConsole(): void {
    if (!this.intercepting) return
    this.intercepting = false
    console.log = this.originalConsole.log
    console.warn = this.originalConsole.warn
    console.error = this.originalConsole.error
    console.info = this.originalConsole.info
    console.debug = this.originalConsole.debug
  }

  private isEnabled(level: LogLevel, minLevel: LogLevel): boolean {
    return LoggingService.LEVEL_PRIORITY[level] >= LoggingService.LEVEL_PRIORITY[minLevel]
  }

  private captureLog(level: LogLevel, args: unknown[]): void {
    const message = String(args[0] ?? '')

    // Extract source from bracketed prefix like "[SinkWriter]"
    const sourceMatch = message.match(/^\[([^\]]+)\]/)
    const source = sourceMatch ? sourceMatch[0] : '[App]'
    const cleanMessage = sourceMatch ? message.slice(sourceMatch[0].length).trim() : message

    // Format additional args, with special handling for Error objects
    const details =
      args.length > 1
        ? args
            .slice(1)
            .map((arg) => {
              if (arg instanceof Error) {
                return `${arg.name}: ${arg.message}\n${arg.stack || 'No stack trace'}`
              }
              try {
                return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
              } catch {
                return String(arg)
              }
            })
            .join('\n\n')
        : undefined

    this.addEntry(level, source, cleanMessage, details)
  }

  private addEntry(level: LogLevel, source: string, message: string, details?: string): void {
    const entry: LogEntry = {
      id: `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
      timestamp: new Date().toISOString(),
      level,
      source,
      message: this.sanitize(message),
      details: details ? this.sanitize(details) : undefined,
    }

    // Route to appropriate buffer based on level
    if (level === 'warn' || level === 'error') {
      this.importantLogs.push(entry)
      if (this.importantLogs.length > MAX_IMPORTANT_ENTRIES) {
        this.importantLogs = this.importantLogs.slice(-MAX_IMPORTANT_ENTRIES)
      }
    } else {
      this.infoLogs.push(entry)
      if (this.infoLogs.length > MAX_INFO_ENTRIES) {
        this.infoLogs = this.infoLogs.slice(-MAX_INFO_ENTRIES)
      }
    }

    this.appendToFileBuffer(entry)
  }

  // Merge both buffers sorted by timestamp
  private get logs(): LogEntry[] {
    return [...this.infoLogs, ...this.importantLogs].sort((a, b) =>
      a.timestamp.localeCompare(b.timestamp)
    )
  }

  getLogs(): LogEntry[] {
    return this.logs
  }

  /**
   * Record a verbose entry. Only buffered when the console level is verbose.
   */
  verbose(source: string, message: string, details?: string): void {
    if (this.consoleMinLevel !== 'verbose') return
    this.writeTerminal(`${source} ${message}`)
    this.addEntry('verbose', source, message, details)
  }

  getSessionInfo(): { sessionId: string; startedAt: string; uptimeMs: number } {
    return {
      sessionId: this.sessionId,
      startedAt: this.startedAt.toISOString(),
      uptimeMs: Date.now() - this.startedAt.getTime(),
    }
  }

  async exportLogs(filePath: string): Promise<void> {
    const sessionInfo = this.getSessionInfo()
    const logs = this.logs

    const exportData = {
      exportedAt: new Date().toISOString(),
      sessionId: sessionInfo.sessionId,
      startedAt: sessionInfo.startedAt,
      sessionDurationMs: sessionInfo.uptimeMs,
      platform: process.platform,
      osRelease: os.release(),
      arch: os.arch(),
      nodeVersion: process.versions.node,
      statistics: {
        totalEntries: logs.length,
        infoCount: this.infoLogs.length,
        warnCount: this.importantLogs.filter((l) => l.level === 'warn').length,
        errorCount: this.importantLogs.filter((l) => l.level === 'error').length,
      },
      logs,
    }

    await fs.writeFile(filePath, JSON.stringify(exportData, null, 2), 'utf-8')
  }

  // ============================================================================
  // File Logging
  // ============================================================================

  /**
   * Start appending entries to daily log files in the given directory
   */
  async initializeFileLogging(options: FileLoggingOptions): Promise<void> {
    this.logDir = options.dir
    this.fileLoggingMinLevel = options.minLevel ?? 'info'
    this.logRetentionDays = options.retentionDays ?? 7

    try {
      await fs.mkdir(this.logDir, { recursive: true })
      this.fileLoggingEnabled = true
      await this.rotateLogFiles()
      this.flushTimer = setInterval(() => void this.flushBuffer(), LoggingService.FLUSH_INTERVAL_MS)
      // Pending writes are flushed by shutdown(); the timer must not keep the process alive
      this.flushTimer.unref()

      this.addEntry('info', '[LoggingService]', `File logging initialized: ${this.logDir}`)
    } catch (err) {
      this.originalConsole.error('[LoggingService] Failed to initialize file logging:', err)
      this.fileLoggingEnabled = false
    }
  }

  private appendToFileBuffer(entry: LogEntry): void {
    if (!this.fileLoggingEnabled || !this.logDir) return
    if (!this.isEnabled(entry.level, this.fileLoggingMinLevel)) return

    const level = entry.level.toUpperCase().padEnd(7)
    let line = `${entry.timestamp} [${level}] ${entry.source} ${entry.message}`
    if (entry.details) {
      line += `\n  ${entry.details.replace(/\n/g, '\n  ')}`
    }
    this.writeBuffer.push(line + '\n')

    if (this.writeBuffer.length >= LoggingService.FLUSH_BUFFER_SIZE) {
      void this.flushBuffer()
    }
  }

  private async flushBuffer(): Promise<void> {
    if (this.writeBuffer.length === 0 || this.isWriting) return

    this.isWriting = true
    const lines = this.writeBuffer.splice(0)

    try {
      const today = new Date().toISOString().split('T')[0]
      const logFile = path.join(this.logDir, `${LOG_FILE_PREFIX}${today}.log`)

      if (today !== this.currentLogDate) {
        this.currentLogDate = today
        await this.rotateLogFiles()
      }

      await fs.appendFile(logFile, lines.join(''), 'utf-8')
    } catch (err) {
      this.originalConsole.error('[LoggingService] Failed to write log file:', err)
    } finally {
      this.isWriting = false
    }
  }

  private async rotateLogFiles(): Promise<void> {
    try {
      const files = await fs.readdir(this.logDir)
      const cutoff = new Date()
      cutoff.setDate(cutoff.getDate() - this.logRetentionDays)

      for (const file of files) {
        if (!file.startsWith(LOG_FILE_PREFIX) || !file.endsWith('.log')) continue
        const dateStr = file.slice(LOG_FILE_PREFIX.length, -'.log'.length)
        const fileDate = new Date(dateStr + 'T00:00:00Z')
        if (isNaN(fileDate.getTime())) continue
        if (fileDate < cutoff) {
          await fs.unlink(path.join(this.logDir, file))
          this.addEntry('info', '[LoggingService]', `Deleted old log file: ${file}`)
        }
      }
    } catch (err) {
      this.originalConsole.error('[LoggingService] Failed to rotate log files:', err)
    }
  }

  /**
   * Flush pending file writes, stop file logging and give the console back
   */
  async shutdown(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer)
      this.flushTimer = null
    }
    // A flush may already be running; wait for it so nothing is left in the buffer
    while (this.isWriting) {
      await new Promise((resolve) => setTimeout(resolve, 10))
    }
    await this.flushBuffer()
    this.fileLoggingEnabled = false
    this.restoreConsole()
  }
}

// Singleton
let loggingService: LoggingService | null = null

export function getLoggingService(): LoggingService {
  if (!loggingService) {
    loggingService = new LoggingService()
  }
  return loggingService
}
