/**
 * Leveled console logger for promptline.
 *
 * Dependency-free: lines are written through `console` as
 * `<ISO timestamp> <LEVEL> <prefix> <message>`. Scoped children share the
 * parent's level so `setLevel` on the root affects every component.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

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
  /** Logger whose prefix is extended with `:scope`, sharing this logger's level. */
  child(scope: string): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

interface LevelCell {
  value: number;
}

function buildLogger(cell: LevelCell, prefix: string): Logger {
  const log = (level: LogLevel, message: string, args: unknown[]) => {
    if (LOG_LEVELS[level] < cell.value) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...args);
        break;
      case 'info':
        console.info(line, ...args);
        break;
      case 'warn':
        console.warn(line, ...args);
        break;
      case 'error':
        console.error(line, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    setLevel: (level) => {
      cell.value = LOG_LEVELS[level];
    },
    child: (scope) => buildLogger(cell, `${prefix.replace(/\]$/, '')}:${scope}]`),
  };
}

/**
 * Create a logger with the given minimum level and bracketed prefix.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[summarizer]');
 * logger.child('cache').debug('hit'); // ... DEBUG [summarizer:cache] hit
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = '[promptline]'): Logger {
  return buildLogger({ value: LOG_LEVELS[minLevel] }, prefix);
}

/** No-op logger for silent operation. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
  child: () => silentLogger,
};
