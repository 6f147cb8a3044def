/**
 * Node Writable Sink
 *
 * Adapts a Node.js Writable into a ContentSink so a body can be copied
 * straight onto a socket, a file or an HTTP response.
 */

import type { Writable } from 'node:stream';
import type { ContentSink } from '../content/types.js';
import { registerTeardown } from '../utils/cancellation.js';
import { IOError, ObjectDisposedError, createCanceledError } from '../utils/errors.js';

function ensureWritable(writable: Writable): void {
  if (writable.destroyed || writable.writableEnded) {
    throw new ObjectDisposedError(writable.constructor.name);
  }
}

/**
 * Wrap a Writable as a ContentSink
 *
 * `write` hands the chunk to the stream's internal buffer and returns before
 * the stream processed it. A failure of that write is raised as an IOError
 * by the next `write` or `writeAsync`; the last chunk of a copy can only
 * fail through the stream's 'error' event. `writeAsync` resolves once
 * the stream processed the chunk and, when the write hit the high water
 * mark, once the stream drained. It rejects with the stream's own error
 * (EPIPE, ERR_STREAM_DESTROYED, ...), which the transfer engine classifies.
 */
export function createWritableSink(writable: Writable): ContentSink {
  let failure: { error: unknown } | null = null;

  function ensureNoFailedWrite(): void {
    if (failure) {
      throw new IOError('An earlier write to the stream failed.', failure.error);
    }
  }

  return {
    write(chunk: Uint8Array): void {
      ensureNoFailedWrite();
      ensureWritable(writable);
      writable.write(chunk, (error) => {
        if (error && !failure) {
          failure = { error };
        }
      });
    },

    writeAsync(chunk: Uint8Array, signal?: AbortSignal): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
          reject(createCanceledError(signal.reason));
          return;
        }
        try {
          ensureNoFailedWrite();
          ensureWritable(writable);
        } catch (error) {
          reject(error);
          return;
        }

        let settled = false;
        let written = false;
        let drained = true;

        const onDrain = () => {
          drained = true;
          settle();
        };
        const registration = registerTeardown(signal, () => {
          settle(createCanceledError(signal?.reason));
        });

        function settle(error?: unknown): void {
          if (settled) return;
          if (error === undefined && !(written && drained)) return;
          settled = true;
          registration.release();
          writable.off('drain', onDrain);
          if (error === undefined) {
            resolve();
          } else {
            reject(error);
          }
        }

        const accepted = writable.write(chunk, (error) => {
          written = true;
          settle(error ?? undefined);
        });
        if (!accepted && !settled) {
          drained = false;
          writable.once('drain', onDrain);
        }
      });
    },
  };
}
