/**
 * Reference Content Writers
 *
 * Generic producers for bodies that already exist as bytes, text or a web
 * stream. Format-specific bodies (multipart, form encoding) implement
 * ContentWriter themselves.
 */

import type { ReadableStream } from 'node:stream/web';
import { TextEncoder } from 'node:util';
import { getConfig } from '../config.js';
import type { ContentSink, ContentWriter } from '../content/types.js';
import { registerTeardown } from '../utils/cancellation.js';
import { createCanceledError, createInvalidStateError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createBufferStream } from './buffer-stream.js';

/**
 * Writer over fixed bytes, or a string encoded as UTF-8
 */
export class BytesContentWriter implements ContentWriter {
  private readonly bytes: Uint8Array;
  private readonly chunkSize: number;

  constructor(content: Uint8Array | string, chunkSize?: number) {
    this.bytes = typeof content === 'string' ? new TextEncoder().encode(content) : content;
    this.chunkSize = chunkSize ?? getConfig().streamChunkSize;
  }

  writeTo(sink: ContentSink): void {
    sink.write(this.bytes);
  }

  async writeToAsync(sink: ContentSink, signal?: AbortSignal): Promise<void> {
    await sink.writeAsync(this.bytes, signal);
  }

  tryComputeLength(): number {
    return this.bytes.length;
  }

  tryOpenStream(): ReadableStream<Uint8Array> {
    return createBufferStream(this.bytes, this.chunkSize).stream;
  }

  async openStreamAsync(): Promise<ReadableStream<Uint8Array>> {
    return this.tryOpenStream();
  }
}

/**
 * Single-use writer over a web ReadableStream
 *
 * The source can be consumed once, either by writing it into a sink or by
 * handing it out as the body's stream. Only asynchronous writes exist.
 */
export class StreamContentWriter implements ContentWriter {
  private consumed = false;

  constructor(
    private readonly source: ReadableStream<Uint8Array>,
    private readonly length: number | null = null
  ) {}

  async writeToAsync(sink: ContentSink, signal?: AbortSignal): Promise<void> {
    const reader = this.take().getReader();
    const registration = registerTeardown(signal, () => {
      reader.cancel(signal?.reason).catch((error: unknown) => {
        logger.debug('Canceling the source stream failed', error);
      });
    });

    try {
      while (true) {
        const { done, value } = await reader.read();
        // Teardown cancels the reader, which ends the read with done
        if (signal?.aborted) {
          throw createCanceledError(signal.reason);
        }
        if (done) break;
        await sink.writeAsync(value, signal);
      }
    } finally {
      registration.release();
      reader.releaseLock();
    }
  }

  tryComputeLength(): number | null {
    return this.length;
  }

  tryOpenStream(): ReadableStream<Uint8Array> {
    return this.take();
  }

  async openStreamAsync(): Promise<ReadableStream<Uint8Array>> {
    return this.take();
  }

  private take(): ReadableStream<Uint8Array> {
    if (this.consumed) {
      throw createInvalidStateError('The stream content was already consumed.');
    }
    this.consumed = true;
    return this.source;
  }
}
