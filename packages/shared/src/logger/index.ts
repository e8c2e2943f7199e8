import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { SilentLogger } from './silentLogger';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export { ConsoleLogger, JsonlLogger, SilentLogger };
