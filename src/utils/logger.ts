/**
 * Leveled stderr logger. Stdout is reserved for the schedule itself.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface for services and providers
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogWriter = (line: string, ...args: unknown[]) => void;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a logger that drops messages below `level`
 */
export function createLogger(
  level: LogLevel = 'warn',
  write: LogWriter = (line, ...args) => console.error(line, ...args)
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const emit =
    (msgLevel: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LOG_LEVELS.indexOf(msgLevel) < threshold) return;
      write(`[availability] [${msgLevel.toUpperCase()}] ${message}`, ...args);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
