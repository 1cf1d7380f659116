import type { LogLevel, Logger } from '@domain/models/Logger.ts'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Console logger that prefixes each line with `[scope]` and drops
 * messages below `level`.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const enabled = (messageLevel: LogLevel) => LEVEL_RANK[messageLevel] >= LEVEL_RANK[level]
  const prefix = `[${scope}]`

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.info(prefix, message, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details)
    },
  }
}
