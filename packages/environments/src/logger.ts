/**
 * Tagged console logger.
 *
 * Every line goes to stderr so stdout stays reserved for command output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function parseLogLevel(value?: string): LogLevel {
  const level = (value || 'info').toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
    return level;
  }
  return 'info';
}

export function createLogger(tag: string, level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_RANK[level];
  const prefix = `[${tag}]`;

  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[at] < threshold) return;
    if (at === 'warn') {
      console.warn(prefix, message, ...details);
    } else {
      console.error(prefix, message, ...details);
    }
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
}
