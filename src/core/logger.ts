import { pino, type Logger, type Level } from 'pino'

export type { Logger }

export interface LoggerOptions {
  level: Level | 'silent'
  /** Destination file. Logs never go to stdout, which belongs to the chat. */
  file: string
}

export function createLogger(opts: LoggerOptions): Logger {
  return pino({
    level: opts.level,
    transport: { target: 'pino/file', options: { destination: opts.file, mkdir: true } },
  })
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
