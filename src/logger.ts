import pino from 'pino';

export type Logger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

function defaultLevel(): LogLevel {
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  const level = process.env.LOG_LEVEL;
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
    return level;
  }
  return 'info';
}

// Logs go to stderr so stdout stays free for command output.
export function createLogger(level: LogLevel = defaultLevel()): Logger {
  return pino({ level, base: undefined }, pino.destination(2));
}
