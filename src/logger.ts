/**
 * Diagnostic logging.
 *
 * Conversion is silent by default. Pass `debug: true` to route messages to
 * `console.debug`, or supply your own {@link Logger}.
 *
 * @module logger
 */

export const LOG_PREFIX = '[md2notion]';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
};

export const consoleLogger: Logger = {
  debug: (message, ...details) => {
    console.debug(LOG_PREFIX, message, ...details);
  },
};

/**
 * Pick the logger for a set of options: an explicit logger wins, then the
 * `debug` flag.
 */
export function resolveLogger(options?: { logger?: Logger; debug?: boolean }): Logger {
  if (options?.logger) return options.logger;
  return options?.debug ? consoleLogger : silentLogger;
}
