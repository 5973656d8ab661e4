export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void
  info: (msg: string, ctx?: Record<string, unknown>) => void
  warn: (msg: string, ctx?: Record<string, unknown>) => void
  error: (msg: string, ctx?: Record<string, unknown>) => void
}

/** Where formatted log lines go. Defaults to stderr so stdout carries only the report. */
export type LogSink = (line: string) => void

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`)
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value)
}

export function createLogger(level: LogLevel = 'warn', sink: LogSink = stderrSink): Logger {
  const minIdx = LOG_LEVELS.indexOf(level)

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(lvl) < minIdx) return
    const payload = ctx ? ` ${JSON.stringify(ctx)}` : ''
    const ts = new Date().toISOString()
    sink(`${ts} [${lvl}] ${msg}${payload}`)
  }

  return {
    debug: (msg, ctx) => log('debug', msg, ctx),
    info: (msg, ctx) => log('info', msg, ctx),
    warn: (msg, ctx) => log('warn', msg, ctx),
    error: (msg, ctx) => log('error', msg, ctx),
  }
}

/** Discards everything. Used when no logger is supplied. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
