/**
 * Buffer Streams
 *
 * Exposes bytes already in memory as a web ReadableStream, and wraps
 * streams produced elsewhere so a body can tear them down on disposal.
 */

import {
  ReadableStream,
  type ReadableStreamDefaultController,
  type ReadableStreamDefaultReader,
} from 'node:stream/web';
import type { StreamHandle } from '../content/types.js';
import { logger } from '../utils/logger.js';

/**
 * Readable view over `bytes`
 *
 * Chunks are `subarray` views, so no byte is copied. Releasing the handle
 * errors the stream even while a reader holds its lock.
 *
 * @param bytes - Content to expose
 * @param chunkSize - Largest chunk handed to a reader
 */
export function createBufferStream(bytes: Uint8Array, chunkSize: number): StreamHandle {
  let offset = 0;
  let finished = false;
  let controllerRef: ReadableStreamDefaultController<Uint8Array> | null = null;

  const stream = new ReadableStream<Uint8Array>(
    {
      start(controller) {
        controllerRef = controller;
        if (bytes.length === 0) {
          finished = true;
          controller.close();
        }
      },
      pull(controller) {
        const end = Math.min(offset + chunkSize, bytes.length);
        controller.enqueue(bytes.subarray(offset, end));
        offset = end;
        if (offset >= bytes.length) {
          finished = true;
          controller.close();
        }
      },
      cancel() {
        finished = true;
      },
    },
    { highWaterMark: 1 }
  );

  return {
    stream,
    release(reason: unknown) {
      if (finished || !controllerRef) return;
      finished = true;
      controllerRef.error(reason);
    },
  };
}

/**
 * Handle for a stream the body did not create
 *
 * The caller gets a stream that pulls from `source` on demand. Releasing
 * the handle errors that stream even while a reader holds its lock, and
 * cancels the source.
 */
export function wrapExternalStream(source: ReadableStream<Uint8Array>): StreamHandle {
  let reader: ReadableStreamDefaultReader<Uint8Array> | null = null;
  let finished = false;
  let controllerRef: ReadableStreamDefaultController<Uint8Array> | null = null;

  function cancelSource(reason: unknown): Promise<void> {
    return reader ? reader.cancel(reason) : source.cancel(reason);
  }

  const stream = new ReadableStream<Uint8Array>(
    {
      start(controller) {
        controllerRef = controller;
      },
      async pull(controller) {
        reader ??= source.getReader();
        const { done, value } = await reader.read();
        if (finished) return;
        if (done) {
          finished = true;
          controller.close();
          return;
        }
        controller.enqueue(value);
      },
      cancel(reason) {
        finished = true;
        return cancelSource(reason);
      },
    },
    { highWaterMark: 0 }
  );

  return {
    stream,
    release(reason: unknown) {
      if (finished) return;
      finished = true;
      controllerRef?.error(reason);
      cancelSource(reason).catch((error: unknown) => {
        logger.debug('Canceling a released body stream failed', error);
      });
    },
  };
}

/**
 * Read a stream to the end and return its bytes
 */
export async function readStreamToBytes(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
      total += value.length;
    }
  } finally {
    reader.releaseLock();
  }

  const combined = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    combined.set(chunk, offset);
    offset += chunk.length;
  }
  return combined;
}
