import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'pressline',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
  });
}

/** A logger that discards everything; for tests and dry runs. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
