import * as fs from 'fs/promises';
import type { PplacesEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { ConsoleLogger } from './consoleLogger';
import type { Logger, LogLevel } from './types';

/**
 * Appends structured events to a JSONL file and forwards plain messages
 * to the console. Selected by `--log-file`.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly console: ConsoleLogger;

  constructor(filePath: string, level: LogLevel = 'info') {
    this.filePath = filePath;
    this.console = new ConsoleLogger(level);
  }

  async log(event: PplacesEvent): Promise<void> {
    const redactedEvent = redactForLogs(event);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken log sink must not fail the command.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    this.console.debug(message);
  }

  info(message: string): void {
    this.console.info(message);
  }

  warn(message: string): void {
    this.console.warn(message);
  }

  error(error: Error, message?: string): void {
    this.console.error(error, message);
  }
}
