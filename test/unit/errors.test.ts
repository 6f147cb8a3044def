/**
 * Content Error Utilities Tests
 *
 * Tests for the error factories, the type guard and fault classification.
 */

import { test, expect } from 'vitest';
import {
  ContentError,
  ContentErrorType,
  IOError,
  ObjectDisposedError,
  createAlreadyDisposedError,
  createCanceledError,
  createCapacityExceededError,
  createDecodeError,
  createInvalidCharsetError,
  createInvalidStateError,
  createTransferFailedError,
  isAbortError,
  isContentError,
  isDisposedFault,
  isIoFault,
  needsTransferWrapping,
} from '../../src/utils/errors.js';

test('ContentError keeps type, cause and details', () => {
  const cause = new Error('root');
  const error = new ContentError(ContentErrorType.DECODE_ERROR, 'bad bytes', cause, { encoding: 'utf-8' });

  expect(error).toBeInstanceOf(Error);
  expect(error.name).toBe('ContentError');
  expect(error.type).toBe(ContentErrorType.DECODE_ERROR);
  expect(error.cause).toBe(cause);
  expect(error.details).toEqual({ encoding: 'utf-8' });
  expect(error.stack).toContain('Caused by: Error: root');
});

test('createCapacityExceededError carries the limit', () => {
  const error = createCapacityExceededError(1024);

  expect(error.type).toBe(ContentErrorType.CAPACITY_EXCEEDED);
  expect(error.message).toBe(
    'Cannot write more bytes to the buffer than the configured maximum buffer size: 1024'
  );
  expect(error.details).toEqual({ maxSize: 1024 });
});

test('createInvalidCharsetError names the charset', () => {
  const cause = new RangeError('unknown');
  const error = createInvalidCharsetError('x-test', cause);

  expect(error.type).toBe(ContentErrorType.INVALID_CHARSET);
  expect(error.message).toBe('The character set provided in ContentType is invalid: x-test');
  expect(error.cause).toBe(cause);
  expect(error.details).toEqual({ charset: 'x-test' });
});

test('createDecodeError names the encoding', () => {
  const error = createDecodeError('utf-16le');

  expect(error.type).toBe(ContentErrorType.DECODE_ERROR);
  expect(error.message).toBe('Content is not valid utf-16le');
});

test('createTransferFailedError wraps the fault', () => {
  const cause = new IOError('broken');
  const error = createTransferFailedError(cause);

  expect(error.type).toBe(ContentErrorType.TRANSFER_FAILED);
  expect(error.message).toBe('Error while copying content to a stream.');
  expect(error.cause).toBe(cause);
});

test('createCanceledError, createInvalidStateError and createAlreadyDisposedError', () => {
  expect(createCanceledError().message).toBe('The operation was canceled.');
  expect(createInvalidStateError('not now').type).toBe(ContentErrorType.INVALID_STATE);

  const disposed = createAlreadyDisposedError('ContentBody');
  expect(disposed.message).toBe('Cannot access a disposed object: ContentBody');
  expect(disposed.details).toEqual({ objectName: 'ContentBody' });
});

test('isContentError narrows by type', () => {
  const error = createCanceledError();

  expect(isContentError(error)).toBe(true);
  expect(isContentError(error, ContentErrorType.CANCELED)).toBe(true);
  expect(isContentError(error, ContentErrorType.DECODE_ERROR)).toBe(false);
  expect(isContentError(new Error('plain'))).toBe(false);
  expect(isContentError('CANCELED')).toBe(false);
});

test('isIoFault recognizes I/O failures', () => {
  expect(isIoFault(new IOError('x'))).toBe(true);
  expect(isIoFault(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
  expect(isIoFault(Object.assign(new Error('open'), { syscall: 'open', code: 'ENOENT' }))).toBe(true);
  expect(isIoFault({ code: 'EPIPE' })).toBe(true);
  expect(isIoFault(new Error('plain'))).toBe(false);
  expect(isIoFault(null)).toBe(false);
});

test('isDisposedFault recognizes use-after-release faults', () => {
  expect(isDisposedFault(new ObjectDisposedError('Socket'))).toBe(true);
  expect(isDisposedFault(createAlreadyDisposedError('ContentBody'))).toBe(true);
  expect(isDisposedFault(Object.assign(new Error('ended'), { code: 'ERR_STREAM_WRITE_AFTER_END' }))).toBe(true);
  expect(isDisposedFault(createCanceledError())).toBe(false);
});

test('needsTransferWrapping covers both fault kinds only', () => {
  expect(needsTransferWrapping(new IOError('x'))).toBe(true);
  expect(needsTransferWrapping(new ObjectDisposedError('Socket'))).toBe(true);
  expect(needsTransferWrapping(createCapacityExceededError(1))).toBe(false);
});

test('isAbortError recognizes aborts', () => {
  const controller = new AbortController();
  controller.abort();

  expect(isAbortError(controller.signal.reason)).toBe(true);
  expect(isAbortError(createCanceledError())).toBe(true);
  expect(isAbortError(new Error('plain'))).toBe(false);
});

test('ObjectDisposedError names the object', () => {
  const error = new ObjectDisposedError('Writable');

  expect(error.message).toBe('Cannot access a disposed object: Writable');
  expect(error.objectName).toBe('Writable');
});
