import pino, { type LevelWithSilent, type Logger } from 'pino'

export type { Logger }

export interface LoggerOptions {
  verbose?: boolean
  // Overrides the level derived from `verbose`, e.g. 'silent' in tests.
  level?: LevelWithSilent
}

// Diagnostics go to stderr so stdout stays free for the JSON the CLI prints.
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? (options.verbose ? 'debug' : 'error')
  return pino({ name: 'c-header-decls', level }, pino.destination(2))
}

export const silentLogger: Logger = pino({ level: 'silent' })
