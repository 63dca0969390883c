/**
 * @footfall/core - Logging
 *
 * footfall never throws out of a request, so fallbacks are reported through
 * a logger instead. The default writes to the console with a "[footfall]"
 * prefix; hosts can pass their own implementation (pino, winston, ...) as
 * long as it has these three methods.
 */

import { LOG_PREFIX } from "./constants.js";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Create a logger that writes to the console with a fixed prefix.
 */
export function createConsoleLogger(prefix: string = LOG_PREFIX): Logger {
  const write = (
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>,
  ): void => {
    if (context && Object.keys(context).length > 0) {
      sink(`${prefix} ${message}`, context);
    } else {
      sink(`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, context) => write(console.debug, message, context),
    warn: (message, context) => write(console.warn, message, context),
    error: (message, context) => write(console.error, message, context),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Shared default used when a component is created without a logger. */
export const defaultLogger: Logger = createConsoleLogger();
