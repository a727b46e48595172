export { createConsoleLogger, createSilentLogger, formatTimestamp, isLogLevel } from './logger.js';
export type { ConsoleLoggerOptions, LogLevel, Logger } from './types.js';
