/**
 * Structured JSON-line logger.
 *
 * One object per line: `{ ts, level, scope, msg, ...fields }`. debug/info go to
 * stdout, warn/error to stderr. Readable by any aggregator that takes JSON
 * from the process streams.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export type LogSink = (line: string, level: LogLevel) => void

export interface Logger {
  readonly scope: string
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Logger with `scope` appended (`parent:child`), same level and sink. */
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  now?: () => Date
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RANK, value)
}

export const stdioSink: LogSink = (line, level) => {
  const stream = level === 'warn' || level === 'error' ? process.stderr : process.stdout
  stream.write(line + '\n')
}

/** Serialize an unknown thrown value into log fields. */
export function errorFields(err: unknown, withStack = false): LogFields {
  if (err instanceof Error) {
    return withStack ? { error: err.message, stack: err.stack } : { error: err.message }
  }
  return { error: String(err) }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = RANK[options.level ?? 'info']
  const sink = options.sink ?? stdioSink
  const now = options.now ?? (() => new Date())

  const emit = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (RANK[level] < threshold) return
    const entry = { ts: now().toISOString(), level, scope, msg, ...fields }
    sink(JSON.stringify(entry), level)
  }

  return {
    scope,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (sub) => createLogger(`${scope}:${sub}`, options),
  }
}

/** Logger that drops everything. Default for library classes. */
export const silentLogger: Logger = createLogger('silent', { sink: () => {} })
