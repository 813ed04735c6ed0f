/**
 * Logging abstraction types
 * The engine itself never writes to a console; callers inject a Logger
 */

/**
 * Log levels
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/**
 * Log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  scope?: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;

  info(message: string, context?: Record<string, unknown>): void;

  warn(message: string, context?: Record<string, unknown>): void;

  error(message: string, error?: Error, context?: Record<string, unknown>): void;

  /**
   * Set minimum log level
   */
  setLevel(level: LogLevel): void;

  getLevel(): LogLevel;

  /**
   * Derive a logger that tags every entry with a component scope
   */
  child(scope: string): Logger;
}

/**
 * Error categories, one per failure family the engine reports
 */
export enum ErrorCategory {
  /** Rejected arguments, before any I/O happens */
  Input = 'input',

  /** Bytes that are not a usable package */
  Format = 'format',

  /** File system reads and writes */
  IO = 'io',

  /** Metadata store lookups */
  Database = 'database',
}

/**
 * Error context for structured error information
 */
export interface ErrorContext {
  /**
   * Operation being performed when error occurred
   */
  operation: string;

  /**
   * Component or module where error occurred
   */
  component: string;

  /**
   * Additional context data
   */
  data?: Record<string, unknown>;
}

/**
 * Application error with structured context
 */
export class AppError extends Error {
  readonly category: ErrorCategory;

  constructor(
    message: string,
    category: ErrorCategory,
    public readonly context: ErrorContext,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.category = category;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert to plain object for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
      stack: this.stack,
    };
  }
}
