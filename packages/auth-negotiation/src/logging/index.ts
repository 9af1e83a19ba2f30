export { noopLog, withMinimumLevel, parseLogLevel } from './logger.js';
export type { Log, LogLevel, LogData } from './logger.js';
