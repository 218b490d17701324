export { LogLevel, LOG_LEVELS, type LogEntry, type Logger, type LogLevelName } from './types.js';
export { NoopLogger, ConsoleLogger, createLogger, type ConsoleLoggerOptions } from './logger.js';
