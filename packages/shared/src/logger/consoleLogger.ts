import type { PplacesEvent } from '../types/events';
import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

/**
 * Human-facing logger. Everything goes to stderr so that stdout only ever
 * carries the report itself. Structured events are echoed at debug level.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  log(event: PplacesEvent): void {
    if (this.enabled('debug')) {
      console.error(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.error(message);
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.error(message);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(message);
    }
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }
}
