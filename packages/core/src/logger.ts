// @tollgate/core — Leveled, structured logger

/** Severity levels; `silent` drops everything */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/** Extra key/value context attached to a log record */
export type LogFields = Readonly<Record<string, unknown>>

/**
 * Logger used throughout Tollgate.
 *
 * Any object with these four methods works (pino, winston and console all
 * fit with a thin wrapper). Never pass key material as a field.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
}

/** Options for `createConsoleLogger` */
export interface ConsoleLoggerOptions {
  /** Minimum level written (default: 'info') */
  readonly level?: LogLevel | undefined
  /** Service name stamped on every record (default: 'tollgate') */
  readonly name?: string | undefined
  /** Emit one JSON object per line instead of text (default: false) */
  readonly json?: boolean | undefined
  /** Line sink (default: process.stderr) */
  readonly write?: ((line: string) => void) | undefined
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

/** Number of token id characters kept by `redactTokenId` */
const REDACTED_PREFIX_LENGTH = 8

/** All log levels, for config parsing */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

/** Type guard for log level strings */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/** A logger that discards everything. */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}

/**
 * Shortens a token id for logs: the first 8 characters followed by `...`.
 * A full id in a log line is a usable credential.
 */
export function redactTokenId(tokenId: string): string {
  if (tokenId.length <= REDACTED_PREFIX_LENGTH) return '...'
  return `${tokenId.slice(0, REDACTED_PREFIX_LENGTH)}...`
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value
  if (value instanceof Error) return value.message
  // JSON.stringify returns undefined for functions and symbols
  const encoded: string | undefined = JSON.stringify(value)
  return encoded ?? String(value)
}

/**
 * Creates a level-filtered logger writing one line per record.
 *
 * Text format: `[2026-01-01T00:00:00.000Z] WARN  tollgate message key=value`
 * JSON format: `{"ts":"...","level":"warn","service":"tollgate","msg":"message","key":"value"}`
 */
export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  const threshold = LEVEL_ORDER[options?.level ?? 'info']
  const service = options?.name ?? 'tollgate'
  const json = options?.json ?? false
  const write =
    options?.write ??
    ((line: string): void => {
      process.stderr.write(`${line}\n`)
    })

  function log(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < threshold) return

    const ts = new Date().toISOString()
    if (json) {
      const record: Record<string, unknown> = { ts, level, service, msg: message }
      for (const [key, value] of Object.entries(fields ?? {})) {
        record[key] = value instanceof Error ? value.message : value
      }
      write(JSON.stringify(record))
      return
    }

    let line = `[${ts}] ${level.toUpperCase().padEnd(5)} ${service} ${message}`
    for (const [key, value] of Object.entries(fields ?? {})) {
      line += ` ${key}=${formatValue(value)}`
    }
    write(line)
  }

  return {
    debug: (message, fields) => {
      log('debug', message, fields)
    },
    info: (message, fields) => {
      log('info', message, fields)
    },
    warn: (message, fields) => {
      log('warn', message, fields)
    },
    error: (message, fields) => {
      log('error', message, fields)
    },
  }
}
