/**
 * Logging Utilities
 *
 * Two loggers share one console sink:
 * - `debug` is silent unless debug mode is switched on (probe noise,
 *   per-request routing decisions)
 * - `logger` always prints (deploy lifecycle, degraded backends,
 *   teardown failures)
 */

/**
 * Logger interface
 */
export interface DebugLogger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

const PREFIX = "[hybrid]";

/**
 * Global debug state
 */
let globalDebugEnabled = false;

/**
 * Set global debug state
 */
export const setDebugEnabled = (enabled: boolean): void => {
  globalDebugEnabled = enabled;
};

/**
 * Check if debug is enabled
 */
export const isDebugEnabled = (): boolean => globalDebugEnabled;

/**
 * Debug-only logging, dropped unless debug mode is on
 */
export const debug: DebugLogger = {
  log: (...args: unknown[]): void => {
    if (globalDebugEnabled) {
      console.log(PREFIX, ...args);
    }
  },
  error: (...args: unknown[]): void => {
    if (globalDebugEnabled) {
      console.error(PREFIX, ...args);
    }
  },
  warn: (...args: unknown[]): void => {
    if (globalDebugEnabled) {
      console.warn(PREFIX, ...args);
    }
  },
};

/**
 * Always-on logging for lifecycle events
 */
export const logger = {
  info: (...args: unknown[]): void => {
    console.log(PREFIX, ...args);
  },
  warn: (...args: unknown[]): void => {
    console.warn(PREFIX, ...args);
  },
  error: (...args: unknown[]): void => {
    console.error(PREFIX, ...args);
  },
};

/**
 * Render an unknown thrown value as a message string
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
