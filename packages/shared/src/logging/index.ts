/**
 * Logging and error handling
 */

export * from './types';
export {
  ConsoleLogger,
  SilentLogger,
  parseLogLevel,
  type ConsoleLoggerOptions,
  type LogWriter,
} from './console-logger';
