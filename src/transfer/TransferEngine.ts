/**
 * Transfer Engine
 *
 * Copies a body into a sink. A buffered body goes out in one bulk write;
 * an unbuffered one has its writer write straight into the sink, with no
 * intermediate buffer.
 *
 * Fault policy:
 * - cancellation observed (signal aborted, or the fault is an abort) -> CANCELED
 * - I/O fault or use-after-release fault -> TRANSFER_FAILED
 * - anything else propagates untouched, so usage errors stay visible
 */

import type { ContentSink, ContentWriter } from '../content/types.js';
import {
  ContentErrorType,
  createAlreadyDisposedError,
  createCanceledError,
  createInvalidStateError,
  createTransferFailedError,
  isAbortError,
  isContentError,
  needsTransferWrapping,
} from '../utils/errors.js';

/**
 * What the engine needs from a body
 */
export interface TransferSource {
  readonly isDisposed: boolean;
  readonly writer: ContentWriter;
  /** Bytes for the bulk path when buffered, otherwise null */
  getBufferedContent(): Uint8Array | null;
}

/**
 * Translate a fault raised while moving body bytes
 *
 * @returns The error to throw in place of `error`
 */
export function classifyFault(error: unknown, signal?: AbortSignal): unknown {
  if (signal?.aborted || isAbortError(error)) {
    return isContentError(error, ContentErrorType.CANCELED) ? error : createCanceledError(error);
  }
  if (isContentError(error, ContentErrorType.TRANSFER_FAILED)) {
    return error;
  }
  if (needsTransferWrapping(error)) {
    return createTransferFailedError(error);
  }
  return error;
}

/**
 * @throws {ContentError} INVALID_STATE when the writer only writes asynchronously
 */
export function ensureSynchronousWriter(
  writer: ContentWriter
): asserts writer is ContentWriter & Required<Pick<ContentWriter, 'writeTo'>> {
  if (!writer.writeTo) {
    throw createInvalidStateError(
      'The content does not support synchronous serialization; use the asynchronous methods.'
    );
  }
}

export class TransferEngine {
  /**
   * Run the writer's synchronous path into a sink
   */
  write(writer: ContentWriter, sink: ContentSink, signal?: AbortSignal): void {
    ensureSynchronousWriter(writer);
    writer.writeTo(sink, signal);
  }

  /**
   * Run the writer's asynchronous path into a sink
   */
  async writeAsync(writer: ContentWriter, sink: ContentSink, signal?: AbortSignal): Promise<void> {
    await writer.writeToAsync(sink, signal);
  }

  copyTo(source: TransferSource, sink: ContentSink, signal?: AbortSignal): void {
    this.ensureNotDisposed(source);
    try {
      const buffered = source.getBufferedContent();
      if (buffered) {
        sink.write(buffered);
      } else {
        this.write(source.writer, sink, signal);
      }
    } catch (error) {
      throw classifyFault(error, signal);
    }
  }

  async copyToAsync(source: TransferSource, sink: ContentSink, signal?: AbortSignal): Promise<void> {
    this.ensureNotDisposed(source);
    try {
      const buffered = source.getBufferedContent();
      if (buffered) {
        await sink.writeAsync(buffered, signal);
      } else {
        await this.writeAsync(source.writer, sink, signal);
      }
    } catch (error) {
      throw classifyFault(error, signal);
    }
  }

  private ensureNotDisposed(source: TransferSource): void {
    if (source.isDisposed) {
      throw createAlreadyDisposedError('ContentBody');
    }
  }
}

/**
 * Shared default engine
 */
export const defaultTransferEngine = new TransferEngine();
