/**
 * Logging sink injected into the editing state
 *
 * Nothing in this package logs through a global; every component takes a
 * `Logger` from its config.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const consoleLogger: Logger = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Whether a logger configured at `configured` forwards messages at `level`
 */
export function isLevelEnabled(configured: LogLevel, level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
}

/**
 * Wrap a sink so that messages below `level` are dropped
 *
 * @example
 * ```typescript
 * const logger = createLogger(consoleLogger, 'debug');
 * logger.debug('replace(0, 3, "abc")');
 * ```
 */
export function createLogger(sink: Logger, level: LogLevel): Logger {
  if (level === 'silent') {
    return silentLogger;
  }
  const enabled = (l: Exclude<LogLevel, 'silent'>): boolean => isLevelEnabled(level, l);

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) sink.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) sink.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) sink.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) sink.error(message, ...args);
    },
  };
}
