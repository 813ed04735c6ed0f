/**
 * Typed failures reported by the revision engine
 *
 * Every failure is an AppError subclass with a machine-readable code, so
 * callers can branch on `error.code` without parsing messages.
 */

import { AppError, ErrorCategory, type ErrorContext } from './logging/types';

export type InputErrorCode =
  | 'InvalidInterval'
  | 'EmptyInput'
  | 'EmptyDocument'
  | 'UnsupportedMode'
  | 'RecordCountMismatch'
  | 'DuplicateRevisionId'
  | 'InvalidTimestamp'
  | 'InvalidArgument';

export type FormatErrorCode = 'NotAPackage' | 'MissingRequiredPart' | 'CorruptPackage';

export type IOErrorCode = 'PathNotFound' | 'PathNotWritable';

export type StoreErrorCode = 'DocumentNotFound' | 'SentenceNotFound';

export type ErrorCode = InputErrorCode | FormatErrorCode | IOErrorCode | StoreErrorCode;

/**
 * Invalid arguments; always raised before any file is touched
 */
export class InputError extends AppError {
  constructor(
    public readonly code: InputErrorCode,
    message: string,
    context: ErrorContext
  ) {
    super(message, ErrorCategory.Input, context);
    this.name = 'InputError';
  }
}

/**
 * Bytes that cannot be read as a word-processing package
 */
export class FormatError extends AppError {
  constructor(
    public readonly code: FormatErrorCode,
    message: string,
    context: ErrorContext,
    cause?: Error
  ) {
    super(message, ErrorCategory.Format, context, cause);
    this.name = 'FormatError';
  }
}

/**
 * Paths that cannot be read or written; surfaced as-is, never retried
 */
export class IOError extends AppError {
  constructor(
    public readonly code: IOErrorCode,
    message: string,
    context: ErrorContext,
    cause?: Error
  ) {
    super(message, ErrorCategory.IO, context, cause);
    this.name = 'IOError';
  }
}

/**
 * Missing rows in the metadata store
 */
export class StoreError extends AppError {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    context: ErrorContext
  ) {
    super(message, ErrorCategory.Database, context);
    this.name = 'StoreError';
  }
}

export type ChronicleError = InputError | FormatError | IOError | StoreError;

export function isChronicleError(error: unknown): error is ChronicleError {
  return (
    error instanceof InputError ||
    error instanceof FormatError ||
    error instanceof IOError ||
    error instanceof StoreError
  );
}

function isErrorLike(value: unknown): value is Error {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * Normalize anything thrown into an Error
 *
 * Errors raised in another realm (Node internals under a test sandbox, vm
 * contexts) fail `instanceof Error` and are passed through as they are.
 */
export function toError(value: unknown): Error {
  return value instanceof Error || isErrorLike(value) ? value : new Error(String(value));
}
