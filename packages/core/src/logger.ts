/**
 * Logging
 *
 * One pino instance per process; components take child loggers tagged
 * with `{ component }`.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino'

export type { Logger }

export interface LoggingConfig {
  level: LevelWithSilent
  /** Human-readable output through pino-pretty (development) */
  pretty: boolean
}

export function createLogger(config: LoggingConfig): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    })
  }
  return pino({ level: config.level })
}

/** Logger that discards everything, for tests and optional dependencies */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
