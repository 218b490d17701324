/**
 * Logger implementations for the datafeed aggregation validator.
 *
 * Provides NoopLogger and ConsoleLogger with structured logging.
 */

import { LogLevel, type LogEntry, type Logger } from './types.js';

// ============================================================================
// NoopLogger Implementation
// ============================================================================

/**
 * No-op logger implementation
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  setLevel(_level: LogLevel): void {
    // No-op
  }
}

// ============================================================================
// ConsoleLogger Implementation
// ============================================================================

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  /** Logger name/component */
  name?: string;
  /** Log level */
  level?: LogLevel;
  /** Use JSON output instead of formatted text */
  json?: boolean;
}

/**
 * Console logger implementation with structured logging
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel = LogLevel.Info;
  private readonly name: string;
  private readonly json: boolean;

  constructor(options?: ConsoleLoggerOptions) {
    this.name = options?.name ?? 'datafeed';
    this.json = options?.json ?? false;

    if (options?.level !== undefined) {
      this.level = options.level;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const logFn = this.getLogFunction(level);

    if (this.json) {
      const logEntry: LogEntry & { component: string } = {
        level,
        message,
        timestamp: Date.now(),
        context,
        component: this.name,
      };
      logFn(JSON.stringify(logEntry));
      return;
    }

    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level].toUpperCase();
    const line = `${timestamp} ${levelStr}[${this.name}] ${message}`;

    if (context && Object.keys(context).length > 0) {
      logFn(line, context);
    } else {
      logFn(line);
    }
  }

  private getLogFunction(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case LogLevel.Error:
        return console.error;
      case LogLevel.Warn:
        return console.warn;
      case LogLevel.Debug:
        return console.debug;
      default:
        return console.log;
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a logger based on configuration
 */
export function createLogger(options?: {
  enabled?: boolean;
  level?: LogLevel;
  json?: boolean;
  name?: string;
}): Logger {
  if (options?.enabled === false) {
    return new NoopLogger();
  }

  return new ConsoleLogger({
    name: options?.name ?? 'datafeed',
    level: options?.level ?? LogLevel.Info,
    json: options?.json ?? false,
  });
}
