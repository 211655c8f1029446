/**
 * Structured logger with JSON output and correlation IDs
 */

import { randomUUID } from 'crypto';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  operation?: string;
  runId?: string;
  collector?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

// stdout carries report output, so log lines go to stderr
const stderrSink: LogSink = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export class Logger {
  private static instance?: Logger;
  private readonly correlationId: string;
  private readonly context: LogContext;
  private logLevel: LogLevel;
  private readonly outputStream: LogSink;

  private constructor(
    logLevel: LogLevel = LogLevel.INFO,
    context: LogContext = {},
    outputStream?: LogSink
  ) {
    this.logLevel = logLevel;
    this.correlationId = context.correlationId || randomUUID();
    this.context = { ...context, correlationId: this.correlationId };
    this.outputStream = outputStream || stderrSink;
  }

  /**
   * Get singleton instance
   */
  static getInstance(logLevel?: LogLevel, context?: LogContext): Logger {
    if (!Logger.instance) {
      const level = logLevel ?? Logger.parseLogLevel(process.env.LOG_LEVEL);
      Logger.instance = new Logger(level, context);
    }
    return Logger.instance;
  }

  /**
   * Standalone logger writing to a custom sink (tests, embedding)
   */
  static withSink(sink: LogSink, logLevel: LogLevel = LogLevel.DEBUG, context?: LogContext): Logger {
    return new Logger(logLevel, context, sink);
  }

  /**
   * Logger that drops everything
   */
  static silent(): Logger {
    return new Logger(LogLevel.ERROR, {}, () => undefined);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(
      this.logLevel,
      {
        ...this.context,
        ...context,
        correlationId: context.correlationId || this.correlationId
      },
      this.outputStream
    );
  }

  /**
   * Create a logger for a specific operation
   */
  forOperation(operation: string, context?: LogContext): Logger {
    return this.child({
      ...context,
      operation,
      operationId: randomUUID()
    });
  }

  /**
   * Map a LOG_LEVEL value to a level; unknown values fall back to INFO
   */
  static parseLogLevel(level?: string): LogLevel {
    switch (level?.toLowerCase()) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'info':
        return LogLevel.INFO;
      case 'debug':
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  /**
   * Build the JSON entry for one log line
   */
  private formatEntry(
    level: string,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: this.correlationId,
      context: this.context
    };

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    return entry;
  }

  /**
   * Whether a message at `level` passes the current threshold
   */
  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  /**
   * Log an error, with its stack when one is given
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.outputStream(this.formatEntry('ERROR', message, metadata, error));
    }
  }

  /**
   * Log a warning
   */
  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.outputStream(this.formatEntry('WARN', message, metadata));
    }
  }

  /**
   * Log info
   */
  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.outputStream(this.formatEntry('INFO', message, metadata));
    }
  }

  /**
   * Log debug details
   */
  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.outputStream(this.formatEntry('DEBUG', message, metadata));
    }
  }

  /**
   * Change the threshold of this logger (children created later inherit it)
   */
  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }
}

/**
 * Process-wide logger, configured from LOG_LEVEL on first use
 */
export function getLogger(): Logger {
  return Logger.getInstance();
}
