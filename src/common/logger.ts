import { type Logger, type LoggerOptions, pino } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/** Level from LOG_LEVEL, falling back to info. */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  return pino({
    name,
    level: defaultLogLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}

/** Logger that discards everything; used where no logger is injected. */
export const silentLogger: Logger = pino({ level: 'silent' });
