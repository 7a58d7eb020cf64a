/**
 * Structured logging for the auth server.
 *
 * Readable single lines in development, one JSON object per line otherwise
 * so log collectors can index `severity`, `scope` and `data`.
 */

import { LogLevelSchema, type LogLevel } from '@passcode-auth/shared-types'

export type { LogLevel }

export interface Logger {
  debug(message: string, data?: unknown): void
  info(message: string, data?: unknown): void
  warn(message: string, data?: unknown): void
  error(message: string, error?: unknown): void
  child(scope: string): Logger
}

export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  scope?: string
  data?: unknown
}

export type LogSink = (level: LogLevel, line: string) => void

export interface CreateLoggerOptions {
  level?: LogLevel
  format?: 'pretty' | 'json'
  scope?: string
  sink?: LogSink
  now?: () => Date
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
      console.error(line)
      break
  }
}

const serializeError = (error: unknown): unknown =>
  error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error

export const formatLogEntry = (entry: LogEntry, format: 'pretty' | 'json'): string => {
  if (format === 'pretty') {
    const scope = entry.scope ? ` [${entry.scope}]` : ''
    const dataStr = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : ''
    return `${entry.timestamp} ${entry.level.toUpperCase()}${scope} ${entry.message}${dataStr}`
  }

  return JSON.stringify({
    severity: entry.level.toUpperCase(),
    message: entry.message,
    timestamp: entry.timestamp,
    ...(entry.scope ? { scope: entry.scope } : {}),
    ...(entry.data !== undefined ? { data: entry.data } : {}),
  })
}

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const minLevel = options.level ?? 'info'
  const format = options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty')
  const sink = options.sink ?? consoleSink
  const now = options.now ?? (() => new Date())

  const write = (level: LogLevel, message: string, data: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return
    const entry: LogEntry = {
      level,
      message,
      timestamp: now().toISOString(),
      scope: options.scope,
      data,
    }
    sink(level, formatLogEntry(entry, format))
  }

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, error) => write('error', message, serializeError(error)),
    child: (scope) =>
      createLogger({
        ...options,
        level: minLevel,
        format,
        sink,
        now,
        scope: options.scope ? `${options.scope}.${scope}` : scope,
      }),
  }
}

const envLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL)

/**
 * Process-wide default. Services accept their own logger; this is only the
 * fallback when none is injected.
 */
export const logger: Logger = createLogger({ level: envLevel.success ? envLevel.data : 'info' })

/**
 * Discards everything. Handy for tests and scripts.
 */
export const silentLogger: Logger = createLogger({ sink: () => undefined })
