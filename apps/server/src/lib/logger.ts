/**
 * Structured logging: one JSON object per line.
 *
 * info goes to stdout, warn and error to stderr, so any aggregator that reads
 * JSON lines from the process streams can pick them up.
 */

export type LogLevel = 'info' | 'warn' | 'error'
export type LogFields = Record<string, unknown>
export type LogSink = (level: LogLevel, line: string) => void

export interface Logger {
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  /** Logger that stamps `bindings` onto every line. */
  child(bindings: LogFields): Logger
}

const stdio: LogSink = (level, line) => {
  if (level === 'info') process.stdout.write(line + '\n')
  else process.stderr.write(line + '\n')
}

/** Render any thrown value as a log-friendly string. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

export function createLogger(bindings: LogFields = {}, sink: LogSink = stdio): Logger {
  const write = (level: LogLevel, event: string, fields: LogFields = {}) => {
    sink(level, JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      ...bindings,
      ...fields,
    }))
  }

  return {
    info: (event, fields) => write('info', event, fields),
    warn: (event, fields) => write('warn', event, fields),
    error: (event, fields) => write('error', event, fields),
    child: (extra) => createLogger({ ...bindings, ...extra }, sink),
  }
}

export const logger = createLogger()
