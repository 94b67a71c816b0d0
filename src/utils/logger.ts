/**
 * Logger utility for wirestream
 *
 * Dependency-free leveled logger. Components accept an optional `Logger`
 * and fall back to {@link silentLogger}, so a library consumer only sees
 * output after passing one in.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Private - not exported from module
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[wirestream]')
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[ticker]');
 * logger.info('stream up'); // 2026-01-21T12:00:00.000Z INFO  [ticker] stream up
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = '[wirestream]'): Logger {
  let currentLevel = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < currentLevel) return;

    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const fullMessage = `${timestamp} ${levelStr} ${prefix} ${message}`;

    switch (level) {
      case 'debug':
        console.debug(fullMessage, ...args);
        break;
      case 'info':
        console.info(fullMessage, ...args);
        break;
      case 'warn':
        console.warn(fullMessage, ...args);
        break;
      case 'error':
        console.error(fullMessage, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      currentLevel = LOG_LEVELS[level];
    },
  };
}

/**
 * Wrap a logger so every message carries a component scope, e.g.
 * `[connection] opened`. Level changes are forwarded to the parent.
 */
export function scopeLogger(parent: Logger, scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...args) => parent.debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => parent.info(`${tag} ${message}`, ...args),
    warn: (message, ...args) => parent.warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => parent.error(`${tag} ${message}`, ...args),
    setLevel: (level) => parent.setLevel(level),
  };
}

/**
 * Parse a log level name (case-insensitive). `warning` is accepted as an
 * alias; anything unrecognised yields `fallback`.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return fallback;
  }
}

/**
 * No-op logger for silent operation
 *
 * Default for every component that accepts an optional logger.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
};
