/**
 * Centralized Logger Utility
 *
 * Provides context-aware, structured logging with support for:
 * - Multiple log levels (debug, info, warn, error)
 * - Configuration-driven output (LOG_LEVEL, STRUCTURED_LOGGING)
 * - Request-scoped and startup-scoped contexts
 * - Query timing when ENABLE_QUERY_LOGGING is on
 * - JSON or human-readable output formats
 *
 * @module lib/logger
 */

import { randomUUID } from 'node:crypto';

/**
 * Log level type
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log level enumeration with priority values
 * Lower numbers = more verbose, higher numbers = less verbose
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/**
 * Output settings, usually taken from AppConfig.logging
 */
export interface LoggerOptions {
  level?: LogLevel;
  structured?: boolean;
  queryLogging?: boolean;
}

/**
 * Context metadata for logging
 */
export interface LogContext {
  requestId?: string;
  taskId?: string;
  type?: 'http' | 'startup' | 'reload';
  [key: string]: unknown;
}

/**
 * Log entry structure
 */
interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

/**
 * Additional data for log entries
 */
type LogData = Record<string, unknown>;

/**
 * Where formatted lines go. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  console[level === 'debug' ? 'log' : level](line);
};

/**
 * Logger class for structured, context-aware logging
 */
export class Logger {
  private options: LoggerOptions;
  private context: LogContext;
  private level: number;
  private structured: boolean;
  private queryLoggingEnabled: boolean;
  private sink: LogSink;

  /**
   * Create a new Logger instance
   *
   * @param options - Level and output format
   * @param context - Contextual metadata (requestId, type, etc.)
   * @param sink - Line writer, console by default
   */
  constructor(options: LoggerOptions = {}, context: LogContext = {}, sink: LogSink = consoleSink) {
    this.options = options;
    this.context = context;
    this.sink = sink;

    this.level = LOG_LEVELS[options.level ?? 'info'];
    this.structured = options.structured === true;
    this.queryLoggingEnabled = options.queryLogging === true;
  }

  /**
   * Create a request-scoped logger sharing this logger's settings
   *
   * @param requestId - Value of the X-Request-ID header for this request
   */
  forRequest(requestId: string): Logger {
    return new Logger(this.options, { ...this.context, requestId, type: 'http' }, this.sink);
  }

  /**
   * Create a startup-scoped logger for loading and reloading the data source
   */
  static forStartup(options: LoggerOptions, type: 'startup' | 'reload' = 'startup', sink?: LogSink): Logger {
    return new Logger(options, {
      taskId: randomUUID().slice(0, 8),
      type
    }, sink);
  }

  /**
   * Internal log method - handles level filtering and formatting
   */
  private _log(level: LogLevel, message: string, data: LogData = {}): void {
    // Filter by configured log level
    if (LOG_LEVELS[level] < this.level) return;

    if (this.structured) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...this.context,
        ...data
      };
      this.sink(level, JSON.stringify(entry));
    } else {
      const ctx = this.context.requestId ? ` [req:${this.context.requestId}]` :
                  this.context.taskId ? ` [${this.context.type ?? 'task'}:${this.context.taskId}]` : '';
      const dataStr = Object.keys(data).length ? ` ${JSON.stringify(data)}` : '';
      this.sink(level, `[${level.toUpperCase()}]${ctx} ${message}${dataStr}`);
    }
  }

  /**
   * Log debug message (most verbose)
   */
  debug(message: string, data?: LogData): void {
    this._log('debug', message, data);
  }

  /**
   * Log info message
   */
  info(message: string, data?: LogData): void {
    this._log('info', message, data);
  }

  /**
   * Log warning message
   */
  warn(message: string, data?: LogData): void {
    this._log('warn', message, data);
  }

  /**
   * Log error message (least verbose, always logged)
   */
  error(message: string, data?: LogData): void {
    this._log('error', message, data);
  }

  /**
   * Log query timing
   *
   * Emitted at info level when ENABLE_QUERY_LOGGING=true, otherwise dropped.
   *
   * @param operation - Query operation name (e.g., 'list_all', 'search')
   * @param durationMs - Query duration in milliseconds
   * @param metadata - Additional metadata (e.g., result_count, filters)
   */
  query(operation: string, durationMs: number, metadata: LogData = {}): void {
    if (!this.queryLoggingEnabled) return;
    this._log('info', `Query: ${operation}`, { durationMs, ...metadata });
  }
}
