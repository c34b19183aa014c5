/**
 * Logging
 *
 * pino loggers; pretty-printed to stderr when attached to a terminal so
 * that stdout stays free for the sync report.
 */

import { pino, destination, type LevelWithSilent, type Logger } from 'pino'

export type { Logger }

export interface LoggerOptions {
  level?: LevelWithSilent
  pretty?: boolean
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  if (options.pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    })
  }
  return pino({ level }, destination(2))
}

/** Default for library callers that pass no logger */
export const silentLogger: Logger = pino({ level: 'silent' })
