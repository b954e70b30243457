export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let threshold: LogLevel = 'info'

/** Process-wide threshold shared by every scoped logger. */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold]
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void
  info(message: string, meta?: Record<string, unknown>): void
  warn(message: string, meta?: Record<string, unknown>): void
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void
}

/**
 * Console logger whose lines read `[<ISO time>] [<scope>] <message>`.
 * Metadata is passed as a second console argument so it stays inspectable.
 */
export function createLogger(scope: string): Logger {
  const prefix = (message: string) => `[${new Date().toISOString()}] [${scope}] ${message}`

  return {
    debug(message, meta) {
      if (!enabled('debug')) return
      if (meta) {
        console.log(prefix(message), meta)
        return
      }
      console.log(prefix(message))
    },
    info(message, meta) {
      if (!enabled('info')) return
      if (meta) {
        console.log(prefix(message), meta)
        return
      }
      console.log(prefix(message))
    },
    warn(message, meta) {
      if (!enabled('warn')) return
      if (meta) {
        console.warn(prefix(message), meta)
        return
      }
      console.warn(prefix(message))
    },
    error(message, error, meta) {
      if (meta) {
        console.error(prefix(message), meta, error)
        return
      }
      if (error !== undefined) {
        console.error(prefix(message), error)
        return
      }
      console.error(prefix(message))
    },
  }
}
