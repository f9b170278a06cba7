// File: src/utils/logger.ts
// Console logger with a level threshold, created once per command and passed down

import { Logger, LogLevel } from '../types'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[]

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export type ConsoleSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>

/**
 * Create a logger writing to the console
 *
 * Progress messages go to `info`, degraded paths to `warn` and failures to `error`.
 * `quiet` drops debug and info output but never warnings or errors.
 *
 * @param level - Lowest level that is printed
 * @param quiet - Suppress progress output
 * @param sink - Console-like target, replaced in tests
 */
export function createLogger(level: LogLevel = 'info', quiet = false, sink: ConsoleSink = console): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level]

  return {
    debug(message, ...details) {
      if (!quiet && enabled('debug')) {
        sink.debug(message, ...details)
      }
    },
    info(message, ...details) {
      if (!quiet && enabled('info')) {
        sink.log(message, ...details)
      }
    },
    warn(message, ...details) {
      if (enabled('warn')) {
        sink.warn(message, ...details)
      }
    },
    error(message, ...details) {
      sink.error(message, ...details)
    },
  }
}
