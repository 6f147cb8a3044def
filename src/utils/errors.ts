/**
 * Content Error Utilities
 *
 * Provides the single error taxonomy surfaced by every body operation.
 * Each failure is one distinguishable ContentErrorType, and the fault that
 * triggered it is always kept as `cause`.
 */

/**
 * Error kinds raised by the body engine
 */
export enum ContentErrorType {
  /** Declared or grown size exceeds the configured maximum */
  CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED',
  /** Declared charset is unknown or badly quoted */
  INVALID_CHARSET = 'INVALID_CHARSET',
  /** Bytes are not valid for the resolved encoding */
  DECODE_ERROR = 'DECODE_ERROR',
  /** I/O or use-after-release fault from the sink or writer */
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  /** Fault observed because cancellation fired */
  CANCELED = 'CANCELED',
  /** Illegal call sequence */
  INVALID_STATE = 'INVALID_STATE',
  /** Operation on a disposed body or buffer */
  ALREADY_DISPOSED = 'ALREADY_DISPOSED',
}

/**
 * Structured details attached to a content error
 */
export interface ContentErrorDetails {
  maxSize?: number;
  charset?: string;
  encoding?: string;
  [key: string]: unknown;
}

/**
 * Custom content error class with type, details and cause
 */
export class ContentError extends Error {
  constructor(
    public readonly type: ContentErrorType,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: ContentErrorDetails
  ) {
    super(message);
    this.name = 'ContentError';
    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * I/O failure raised by a sink or a writer
 *
 * Sinks that are not backed by a Node stream throw this to get their
 * failures translated into TRANSFER_FAILED.
 */
export class IOError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'IOError';
  }
}

/**
 * Use-after-release fault: a resource was used after it was torn down
 */
export class ObjectDisposedError extends Error {
  constructor(public readonly objectName: string) {
    super(`Cannot access a disposed object: ${objectName}`);
    this.name = 'ObjectDisposedError';
  }
}

/**
 * Type guard for content errors, optionally of a given type
 */
export function isContentError(error: unknown, type?: ContentErrorType): error is ContentError {
  return error instanceof ContentError && (type === undefined || error.type === type);
}

/**
 * Create a capacity exceeded error
 *
 * @example
 * ```ts
 * throw createCapacityExceededError(1024);
 * ```
 */
export function createCapacityExceededError(maxSize: number): ContentError {
  return new ContentError(
    ContentErrorType.CAPACITY_EXCEEDED,
    `Cannot write more bytes to the buffer than the configured maximum buffer size: ${maxSize}`,
    undefined,
    { maxSize }
  );
}

/**
 * Create an invalid charset error
 */
export function createInvalidCharsetError(charset: string, cause?: unknown): ContentError {
  return new ContentError(
    ContentErrorType.INVALID_CHARSET,
    `The character set provided in ContentType is invalid: ${charset}`,
    cause,
    { charset }
  );
}

/**
 * Create a decode error
 */
export function createDecodeError(encoding: string, cause?: unknown): ContentError {
  return new ContentError(
    ContentErrorType.DECODE_ERROR,
    `Content is not valid ${encoding}`,
    cause,
    { encoding }
  );
}

/**
 * Create a transfer failed error wrapping the original fault
 */
export function createTransferFailedError(cause: unknown): ContentError {
  return new ContentError(
    ContentErrorType.TRANSFER_FAILED,
    'Error while copying content to a stream.',
    cause
  );
}

/**
 * Create a canceled error wrapping the fault observed during cancellation
 */
export function createCanceledError(cause?: unknown): ContentError {
  return new ContentError(ContentErrorType.CANCELED, 'The operation was canceled.', cause);
}

/**
 * Create an invalid state error
 */
export function createInvalidStateError(message: string): ContentError {
  return new ContentError(ContentErrorType.INVALID_STATE, message);
}

/**
 * Create an already disposed error
 */
export function createAlreadyDisposedError(objectName: string): ContentError {
  return new ContentError(
    ContentErrorType.ALREADY_DISPOSED,
    `Cannot access a disposed object: ${objectName}`,
    undefined,
    { objectName }
  );
}

/**
 * Node stream error codes raised when writing to a destroyed or ended stream
 */
const DISPOSED_STREAM_CODES = new Set([
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
  'ERR_STREAM_PREMATURE_CLOSE',
  'ERR_STREAM_ALREADY_FINISHED',
  'ERR_INVALID_STATE',
]);

/**
 * Socket and pipe error codes treated as I/O failures
 */
const IO_ERROR_CODES = new Set([
  'EPIPE',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EIO',
  'ENOSPC',
  'EBADF',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Whether an error is an I/O failure
 */
export function isIoFault(error: unknown): boolean {
  if (error instanceof IOError) {
    return true;
  }
  const code = errorCode(error);
  if (code !== undefined && IO_ERROR_CODES.has(code)) {
    return true;
  }
  // errno exceptions from fs and net carry the failing syscall
  return error instanceof Error && 'syscall' in error && typeof error.syscall === 'string';
}

/**
 * Whether an error is a use-after-release fault
 */
export function isDisposedFault(error: unknown): boolean {
  if (error instanceof ObjectDisposedError) {
    return true;
  }
  if (isContentError(error, ContentErrorType.ALREADY_DISPOSED)) {
    return true;
  }
  const code = errorCode(error);
  return code !== undefined && DISPOSED_STREAM_CODES.has(code);
}

/**
 * Whether an error belongs to the fault categories translated into TRANSFER_FAILED
 */
export function needsTransferWrapping(error: unknown): boolean {
  return isIoFault(error) || isDisposedFault(error);
}

/**
 * Whether an error is an abort raised by an AbortSignal
 */
export function isAbortError(error: unknown): boolean {
  return (
    isContentError(error, ContentErrorType.CANCELED) ||
    (typeof error === 'object' &&
      error !== null &&
      'name' in error &&
      error.name === 'AbortError')
  );
}
