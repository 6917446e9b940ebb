/**
 * Logging interface used by the cache layer and sources.
 *
 * The default logger writes warnings and errors to the console; swap it
 * with `setLogger` or pass `logger` in the options of a `CacheLayer`.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console logger that drops messages below `level`.
 */
export function createConsoleLogger(level: LogLevel = 'debug'): Logger {
  const enabled = (messageLevel: LogLevel) => LEVEL_RANK[messageLevel] >= LEVEL_RANK[level];

  /* eslint-disable no-console */
  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`[quarry] ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.info(`[quarry] ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`[quarry] ${message}`, ...args);
    },
    error(message, error, ...args) {
      if (!enabled('error')) return;
      if (error !== undefined) {
        console.error(`[quarry] ${message}`, error, ...args);
      }
      else {
        console.error(`[quarry] ${message}`, ...args);
      }
    },
  };
  /* eslint-enable no-console */
}

export const consoleLogger: Logger = createConsoleLogger('debug');

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};

let currentLogger: Logger = createConsoleLogger('warn');

/**
 * Logger picked up by components created without an explicit one.
 */
export function getLogger(): Logger {
  return currentLogger;
}

/**
 * Replace the default logger for components created afterwards.
 *
 * @example
 * ```ts
 * setLogger(consoleLogger); // include debug output
 * setLogger(noopLogger);    // silence everything
 * ```
 */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}
