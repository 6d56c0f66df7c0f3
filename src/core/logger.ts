import { pino, type Logger, type LevelWithSilent } from 'pino'

export type LogLevel = LevelWithSilent

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

/**
 * The only logging capability the response encoder needs. Pino loggers and
 * Fastify's request.log both satisfy it.
 */
export interface ErrorLogger {
  error(obj: object, msg: string): void
}

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ level })
}
