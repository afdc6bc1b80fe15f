/**
 * logger.ts
 * ----------
 * Tiny, dependency-free levelled logger.
 * - Levels: trace, debug, info, warn, error, silent
 * - ISO timestamps
 * - Hierarchical prefixes via logger.child("scope")
 * - Configurable global level and handler sink
 * - Timing helper: measure()
 *
 * Everything goes to stderr by default so diagnostics never interleave with
 * results a caller prints to stdout.
 */

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LEVELS: Record<LogLevelName, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 99
}

export function isLogLevel(v: unknown): v is LogLevelName {
  return typeof v === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, v)
}

export interface LogMeta {
  ts: Date
  level: LogLevelName
  prefix: string[]
}

export type LogHandler = (meta: LogMeta, ...args: unknown[]) => void

const envLevel = process.env.COURIER_LOG_LEVEL
let currentLevel: LogLevelName = isLogLevel(envLevel) ? envLevel : 'info'

function tsISO(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/* ------------------------------- Default Sink ------------------------------ */

const stderrHandler: LogHandler = (meta, ...args) => {
  const tag = meta.prefix.length ? `[${meta.prefix.join(':')}]` : ''
  const head = `${tsISO(meta.ts)} ${meta.level.toUpperCase()}`
  console.error(tag ? `${head} ${tag}` : head, ...args)
}

let handler: LogHandler = stderrHandler

/* --------------------------------- Logger --------------------------------- */

export interface ILogger {
  trace(...args: unknown[]): void
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void

  /** Create a child logger with an extra prefix scope segment. */
  child(scope: string): ILogger

  /** Measure a sync/async function, logging its duration at debug; returns the function result. */
  measure<T>(label: string, fn: () => T | Promise<T>): Promise<T>
}

class Logger implements ILogger {
  private readonly prefix: string[]

  constructor(prefix?: string[]) {
    this.prefix = prefix ? [...prefix] : []
  }

  private emit(level: LogLevelName, args: unknown[]) {
    if (LEVELS[level] < LEVELS[currentLevel]) return
    handler({ ts: new Date(), level, prefix: this.prefix }, ...args)
  }

  trace = (...args: unknown[]) => this.emit('trace', args)
  debug = (...args: unknown[]) => this.emit('debug', args)
  info = (...args: unknown[]) => this.emit('info', args)
  warn = (...args: unknown[]) => this.emit('warn', args)
  error = (...args: unknown[]) => this.emit('error', args)

  child(scope: string): ILogger {
    return new Logger(scope ? [...this.prefix, scope] : this.prefix)
  }

  async measure<T>(label: string, fn: () => T | Promise<T>): Promise<T> {
    const t0 = performance.now()
    try {
      return await fn()
    } finally {
      this.debug(`${label} +${(performance.now() - t0).toFixed(2)}ms`)
    }
  }
}

/* ----------------------------- Global Controls ---------------------------- */

export function setGlobalLogLevel(lvl: LogLevelName): void {
  currentLevel = lvl
}

/** Replace the sink (pass null to restore the stderr default). */
export function setLogHandler(h: LogHandler | null): void {
  handler = h ?? stderrHandler
}

/* --------------------------------- Factory -------------------------------- */

const rootLogger: ILogger = new Logger([])

/** Scoped child from root. */
export function logger(scope?: string): ILogger {
  return scope ? rootLogger.child(scope) : rootLogger
}
