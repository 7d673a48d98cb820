export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogThreshold = LogLevel | 'silent'

export type LogFields = {
  event: string
  request_id?: string | null
  user_id?: string | null
  date?: string | null
  swap_id?: string | null
  allocation_id?: string | null
  error_code?: string | null
  [key: string]: unknown
}

export interface Logger {
  debug(fields: LogFields): void
  info(fields: LogFields): void
  warn(fields: LogFields): void
  error(fields: LogFields): void
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

type LineSink = (level: LogLevel, line: string) => void

function consoleSink(level: LogLevel, line: string) {
  if (level === 'error') {
    console.error(line)
    return
  }
  if (level === 'warn') {
    console.warn(line)
    return
  }
  console.info(line)
}

function compactFields(fields: LogFields): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined))
}

/**
 * JSON-lines logger. One line per event: `{ ts, level, event, ...fields }`.
 */
export function createLogger(options: { level?: LogThreshold; sink?: LineSink } = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info']
  const sink = options.sink ?? consoleSink

  const write = (level: LogLevel, fields: LogFields) => {
    if (LEVEL_RANK[level] < threshold) return
    const payload = {
      ts: new Date().toISOString(),
      level,
      ...compactFields(fields),
    }
    sink(level, JSON.stringify(payload))
  }

  return {
    debug: (fields) => write('debug', fields),
    info: (fields) => write('info', fields),
    warn: (fields) => write('warn', fields),
    error: (fields) => write('error', fields),
  }
}

export const silentLogger: Logger = createLogger({ level: 'silent' })

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
