/**
 * Content Body
 *
 * An HTTP message body whose bytes come from a ContentWriter. A body can be
 * materialized once into a bounded buffer and then read any number of
 * times, exposed as a single cached stream, or copied straight into a sink.
 *
 * State is monotonic: unbuffered -> buffered, empty -> stream/pending, and
 * anything -> disposed. Disposal is terminal and every operation after it
 * throws ALREADY_DISPOSED.
 *
 * @example
 * ```ts
 * const body = new ContentBody(new BytesContentWriter('hello'), {
 *   headers: { charset: 'utf-8' },
 * });
 * await body.loadIntoBufferAsync(1024);
 * const text = await body.readAsText();
 * body.dispose();
 * ```
 */

import type { ReadableStream } from 'node:stream/web';
import { createBoundedBuffer, type BoundedBuffer } from '../buffer/BoundedBuffer.js';
import { MAX_BUFFER_SIZE } from '../buffer/constants.js';
import { getConfig } from '../config.js';
import { decodeText } from '../encoding/EncodingResolver.js';
import { getBufferPool, unpooledAllocator } from '../pool/BufferPool.js';
import type { ByteArrayPool } from '../pool/types.js';
import { createBufferStream, wrapExternalStream } from '../streaming/buffer-stream.js';
import {
  TransferEngine,
  classifyFault,
  defaultTransferEngine,
  ensureSynchronousWriter,
  type TransferSource,
} from '../transfer/TransferEngine.js';
import { registerTeardown } from '../utils/cancellation.js';
import {
  createAlreadyDisposedError,
  createCanceledError,
  createCapacityExceededError,
  createInvalidStateError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  ContentHeaders,
  ContentSink,
  ContentWriter,
  ReadStreamState,
  StreamHandle,
} from './types.js';

export interface ContentBodyOptions {
  /** Declared length and charset */
  headers?: ContentHeaders;
  /** Storage for bodies of unknown length (defaults to the shared pool) */
  pool?: ByteArrayPool;
  engine?: TransferEngine;
  /** Cap used by the read operations (defaults to CONTENT_MAX_BUFFER_SIZE) */
  maxBufferSize?: number;
  initialBufferSize?: number;
  streamChunkSize?: number;
}

type PendingStreamState = Extract<ReadStreamState, { kind: 'pending' }>;

const OBJECT_NAME = 'ContentBody';

export class ContentBody implements TransferSource {
  readonly headers: ContentHeaders;

  private readonly pool: ByteArrayPool;
  private readonly engine: TransferEngine;
  private readonly maxBufferSize: number;
  private readonly initialBufferSize: number;
  private readonly streamChunkSize: number;

  private buffered: BoundedBuffer | null = null;
  private readStream: ReadStreamState = { kind: 'empty' };
  private disposed = false;
  private canComputeLength = true;
  private loadFailure: { error: unknown } | null = null;

  constructor(
    readonly writer: ContentWriter,
    options: ContentBodyOptions = {}
  ) {
    const config = getConfig();
    this.headers = options.headers ?? {};
    this.pool = options.pool ?? (config.bufferPoolEnabled ? getBufferPool() : unpooledAllocator);
    this.engine = options.engine ?? defaultTransferEngine;
    this.maxBufferSize = options.maxBufferSize ?? config.maxBufferSize;
    this.initialBufferSize = options.initialBufferSize ?? config.initialBufferSize;
    this.streamChunkSize = options.streamChunkSize ?? config.streamChunkSize;
  }

  get isBuffered(): boolean {
    return this.buffered !== null;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ==========================================================================
  // Materialization
  // ==========================================================================

  /**
   * Materialize the body synchronously. Does nothing when already buffered.
   *
   * A failure disposes the body; calling again rethrows the same failure.
   *
   * @throws {RangeError} If maxBufferSize is outside 0..MAX_BUFFER_SIZE
   * @throws {ContentError} CAPACITY_EXCEEDED, CANCELED, TRANSFER_FAILED,
   *   INVALID_STATE (writer has no synchronous path) or ALREADY_DISPOSED
   */
  loadIntoBuffer(maxBufferSize: number = this.maxBufferSize, signal?: AbortSignal): void {
    this.rethrowLoadFailure();
    this.ensureNotDisposed();
    if (this.buffered) {
      this.checkMaxBufferSize(maxBufferSize);
      return;
    }
    ensureSynchronousWriter(this.writer);
    const buffer = this.createTemporaryBuffer(maxBufferSize);
    if (!buffer) return;

    const registration = registerTeardown(signal, () => this.dispose());
    try {
      if (signal?.aborted) {
        throw createCanceledError(signal.reason);
      }
      this.engine.write(this.writer, buffer, signal);
      this.commit(buffer, signal);
    } catch (error) {
      throw this.failLoad(buffer, error, signal);
    } finally {
      registration.release();
    }
  }

  /**
   * Materialize the body. Resolves immediately when already buffered.
   *
   * Aborting `signal` disposes the body, and the load rejects with CANCELED.
   */
  async loadIntoBufferAsync(
    maxBufferSize: number = this.maxBufferSize,
    signal?: AbortSignal
  ): Promise<void> {
    this.rethrowLoadFailure();
    this.ensureNotDisposed();
    const buffer = this.createTemporaryBuffer(maxBufferSize);
    if (!buffer) return;

    const registration = registerTeardown(signal, () => this.dispose());
    try {
      if (signal?.aborted) {
        throw createCanceledError(signal.reason);
      }
      await this.engine.writeAsync(this.writer, buffer, signal);
      this.commit(buffer, signal);
    } catch (error) {
      throw this.failLoad(buffer, error, signal);
    } finally {
      registration.release();
    }
  }

  private checkMaxBufferSize(maxBufferSize: number): void {
    if (!Number.isInteger(maxBufferSize) || maxBufferSize < 0 || maxBufferSize > MAX_BUFFER_SIZE) {
      throw new RangeError(
        `maxBufferSize must be an integer between 0 and ${MAX_BUFFER_SIZE}: ${maxBufferSize}`
      );
    }
  }

  private createTemporaryBuffer(maxBufferSize: number): BoundedBuffer | null {
    this.checkMaxBufferSize(maxBufferSize);
    if (this.buffered) return null;

    const declared = this.headers.contentLength ?? null;
    if (declared !== null && (!Number.isSafeInteger(declared) || declared < 0)) {
      this.rejectLoad(new RangeError(`contentLength must be a non-negative integer: ${declared}`));
    }
    if (declared !== null && declared > maxBufferSize) {
      this.rejectLoad(createCapacityExceededError(maxBufferSize));
    }
    return createBoundedBuffer(maxBufferSize, declared, this.pool, this.initialBufferSize);
  }

  // Fails the load before the writer ran
  private rejectLoad(error: Error): never {
    this.loadFailure = { error };
    this.dispose();
    throw error;
  }

  private commit(buffer: BoundedBuffer, signal?: AbortSignal): void {
    // Disposed while the writer ran
    if (this.disposed) {
      throw signal?.aborted
        ? createCanceledError(signal.reason)
        : createAlreadyDisposedError(OBJECT_NAME);
    }
    this.buffered = buffer;
    logger.debug(`Buffered ${buffer.length} bytes`);
  }

  private failLoad(buffer: BoundedBuffer, error: unknown, signal?: AbortSignal): unknown {
    buffer.dispose();
    const failure = classifyFault(error, signal);
    logger.debug('Loading content into buffer failed', failure);
    this.loadFailure = { error: failure };
    this.dispose();
    return failure;
  }

  private rethrowLoadFailure(): void {
    if (this.loadFailure) {
      throw this.loadFailure.error;
    }
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Read the body as text, decoded with the declared charset or the
   * encoding its byte-order mark names (UTF-8 otherwise)
   *
   * @throws {ContentError} INVALID_CHARSET or DECODE_ERROR
   */
  async readAsText(signal?: AbortSignal): Promise<string> {
    this.ensureNotDisposed();
    await this.loadIntoBufferAsync(this.maxBufferSize, signal);
    return this.decodeBuffered();
  }

  readAsTextSync(signal?: AbortSignal): string {
    this.ensureNotDisposed();
    this.loadIntoBuffer(this.maxBufferSize, signal);
    return this.decodeBuffered();
  }

  /**
   * Read the body as a new array the caller owns
   */
  async readAsBytes(signal?: AbortSignal): Promise<Uint8Array> {
    this.ensureNotDisposed();
    await this.loadIntoBufferAsync(this.maxBufferSize, signal);
    return this.requireBuffer().toOwnedCopy();
  }

  readAsBytesSync(signal?: AbortSignal): Uint8Array {
    this.ensureNotDisposed();
    this.loadIntoBuffer(this.maxBufferSize, signal);
    return this.requireBuffer().toOwnedCopy();
  }

  private decodeBuffered(): string {
    const buffer = this.requireBuffer();
    if (buffer.length === 0) return '';
    return decodeText(buffer.asZeroCopyView() ?? buffer.toOwnedCopy(), this.headers.charset);
  }

  private requireBuffer(): BoundedBuffer {
    this.ensureNotDisposed();
    if (!this.buffered) {
      throw createInvalidStateError('The content is not buffered.');
    }
    return this.buffered;
  }

  // ==========================================================================
  // Streams
  // ==========================================================================

  /**
   * Get the body's read stream, creating it on first use
   *
   * Later calls return the same stream.
   *
   * @throws {ContentError} INVALID_STATE while an asynchronous request is still pending
   */
  readAsStream(signal?: AbortSignal): ReadableStream<Uint8Array> {
    this.ensureNotDisposed();
    const state = this.readStream;

    switch (state.kind) {
      case 'stream':
        return state.handle.stream;
      case 'pending':
        if (state.resolved) return state.resolved.stream;
        throw createInvalidStateError(
          'The read stream was requested asynchronously and is not ready; it cannot be fetched synchronously.'
        );
      case 'empty': {
        const handle = this.openStreamSync(signal);
        this.readStream = { kind: 'stream', handle };
        return handle.stream;
      }
    }
  }

  /**
   * Get the body's read stream asynchronously
   *
   * While the first request is in flight, further calls return the
   * identical promise.
   */
  readAsStreamAsync(signal?: AbortSignal): Promise<ReadableStream<Uint8Array>> {
    if (this.disposed) {
      return Promise.reject(createAlreadyDisposedError(OBJECT_NAME));
    }
    const state = this.readStream;

    switch (state.kind) {
      case 'stream':
        return Promise.resolve(state.handle.stream);
      case 'pending':
        return state.promise;
      case 'empty': {
        if (this.buffered) {
          const handle = this.createBufferedStream(this.buffered);
          this.readStream = { kind: 'stream', handle };
          return Promise.resolve(handle.stream);
        }
        return this.startPendingStream(signal).promise;
      }
    }
  }

  /**
   * Get the read stream only when that needs no materialization or
   * asynchronous work, otherwise null
   */
  tryReadAsStream(): ReadableStream<Uint8Array> | null {
    this.ensureNotDisposed();
    const state = this.readStream;

    switch (state.kind) {
      case 'stream':
        return state.handle.stream;
      case 'pending':
        return state.resolved?.stream ?? null;
      case 'empty': {
        let handle: StreamHandle | null = null;
        if (this.buffered) {
          handle = this.createBufferedStream(this.buffered);
        } else {
          const direct = this.writer.tryOpenStream?.() ?? null;
          if (direct) handle = wrapExternalStream(direct);
        }
        if (!handle) return null;
        this.readStream = { kind: 'stream', handle };
        return handle.stream;
      }
    }
  }

  private openStreamSync(signal?: AbortSignal): StreamHandle {
    if (!this.buffered) {
      const direct = this.writer.tryOpenStream?.() ?? null;
      if (direct) return wrapExternalStream(direct);
      this.loadIntoBuffer(this.maxBufferSize, signal);
    }
    return this.createBufferedStream(this.requireBuffer());
  }

  private startPendingStream(signal?: AbortSignal): PendingStreamState {
    const handlePromise = this.openStreamAsync(signal);
    const pending: PendingStreamState = {
      kind: 'pending',
      promise: handlePromise.then((handle) => handle.stream),
      resolved: null,
    };
    this.readStream = pending;

    void handlePromise.then(
      (handle) => {
        pending.resolved = handle;
      },
      (error: unknown) => {
        logger.debug('Opening the read stream failed', error);
      }
    );
    return pending;
  }

  private async openStreamAsync(signal?: AbortSignal): Promise<StreamHandle> {
    if (this.writer.openStreamAsync) {
      return wrapExternalStream(await this.writer.openStreamAsync(signal));
    }
    await this.loadIntoBufferAsync(this.maxBufferSize, signal);
    return this.createBufferedStream(this.requireBuffer());
  }

  private createBufferedStream(buffer: BoundedBuffer): StreamHandle {
    return createBufferStream(buffer.asZeroCopyView() ?? buffer.toOwnedCopy(), this.streamChunkSize);
  }

  // ==========================================================================
  // Transfer
  // ==========================================================================

  /**
   * Copy the body into a sink synchronously
   *
   * @throws {ContentError} CANCELED or TRANSFER_FAILED
   */
  copyTo(sink: ContentSink, signal?: AbortSignal): void {
    this.engine.copyTo(this, sink, signal);
  }

  copyToAsync(sink: ContentSink, signal?: AbortSignal): Promise<void> {
    return this.engine.copyToAsync(this, sink, signal);
  }

  getBufferedContent(): Uint8Array | null {
    if (!this.buffered) return null;
    return this.buffered.asZeroCopyView() ?? this.buffered.toOwnedCopy();
  }

  /**
   * Zero-copy view of the buffered bytes, or null when unbuffered or the
   * storage is pooled
   */
  tryGetBuffer(): Uint8Array | null {
    this.ensureNotDisposed();
    return this.buffered?.asZeroCopyView() ?? null;
  }

  // ==========================================================================
  // Length and lifecycle
  // ==========================================================================

  /**
   * Length of the body in bytes, or null when it cannot be known without
   * materializing it. Once the writer reports it cannot compute one, it is
   * not asked again.
   */
  computedLength(): number | null {
    this.ensureNotDisposed();
    if (this.buffered) {
      return this.buffered.length;
    }
    if (this.canComputeLength) {
      const length = this.writer.tryComputeLength?.() ?? null;
      if (length !== null) return length;
      this.canComputeLength = false;
    }
    return null;
  }

  /**
   * Release the buffer and tear down any stream handed out. Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const reason = createAlreadyDisposedError(OBJECT_NAME);
    const state = this.readStream;
    if (state.kind === 'stream') {
      state.handle.release(reason);
    } else if (state.kind === 'pending' && state.resolved) {
      state.resolved.release(reason);
    }

    if (this.buffered) {
      this.buffered.dispose();
      this.buffered = null;
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw createAlreadyDisposedError(OBJECT_NAME);
    }
  }
}
