import type { PplacesEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Severity levels understood by the console sinks, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Interface for logging throughout pplaces.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'ScanStarted', ... });
 * logger.warn('Permission denied: /srv/private');
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: PplacesEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, hidden unless verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;
}
