export { Logger, defaultLogger, isLogLevel } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './logger.js';
