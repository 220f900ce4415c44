import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export { LOG_LEVEL_ORDER } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger };
