/**
 * Console logger implementation
 * Writes every level to stderr so stdout stays free for command output
 */

import type { Logger, LogEntry } from './types';
import { LogLevel } from './types';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/**
 * Line sink, replaceable in tests
 */
export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  writer?: LogWriter;
}

export class ConsoleLogger implements Logger {
  private currentLevel: LogLevel;
  private readonly scope: string | undefined;
  private readonly writer: LogWriter;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.currentLevel = options.level ?? LogLevel.Info;
    this.scope = options.scope;
    this.writer = options.writer ?? stderrWriter;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.currentLevel];
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const scope = entry.scope ? ` [${entry.scope}]` : '';
    let message = `[${timestamp}] ${level}${scope} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      message += ` ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack && this.currentLevel === LogLevel.Debug) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return message;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;

    this.writer(
      this.formatMessage({
        level,
        message,
        timestamp: Date.now(),
        scope: this.scope,
        context,
        error,
      })
    );
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

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context, error);
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      level: this.currentLevel,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      writer: this.writer,
    });
  }
}

/**
 * Logger that discards everything; the default for library calls
 */
export class SilentLogger implements Logger {
  private currentLevel: LogLevel = LogLevel.Error;

  debug(): void {}

  info(): void {}

  warn(): void {}

  error(): void {}

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  child(): Logger {
    return this;
  }
}

/**
 * Parse a log level name, case-insensitively
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.trim().toLowerCase();
  for (const level of Object.values(LogLevel)) {
    if (level === normalized) {
      return level;
    }
  }
  return null;
}
