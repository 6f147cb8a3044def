/**
 * Test Fixtures and Utilities
 *
 * Recording sinks, scripted writers and a counting pool shared by the
 * engine tests.
 */

import { ReadableStream } from 'node:stream/web';
import { TextDecoder, TextEncoder } from 'node:util';
import { resetConfig } from '../src/config.js';
import type { ContentSink, ContentWriter } from '../src/content/types.js';
import { resetBufferPool } from '../src/pool/BufferPool.js';
import type { ByteArrayPool } from '../src/pool/types.js';
import { createCanceledError } from '../src/utils/errors.js';
import { setLogLevel } from '../src/utils/logger.js';

const CONTENT_ENV_KEYS = [
  'CONTENT_MAX_BUFFER_SIZE',
  'CONTENT_INITIAL_BUFFER_SIZE',
  'CONTENT_STREAM_CHUNK_SIZE',
  'CONTENT_BUFFER_POOL_ENABLED',
] as const;

/**
 * Reset config, the shared pool and the log level, then apply `customEnv`.
 *
 * ```ts
 * beforeEach(() => {
 *   setupTestEnvironment({ CONTENT_STREAM_CHUNK_SIZE: '4' });
 * });
 * ```
 */
export function setupTestEnvironment(customEnv?: Partial<Record<string, string>>): void {
  for (const key of CONTENT_ENV_KEYS) {
    delete process.env[key];
  }
  if (customEnv) {
    Object.entries(customEnv).forEach(([key, value]) => {
      process.env[key] = value;
    });
  }
  resetConfig();
  resetBufferPool();
  setLogLevel(null);
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const combined = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    combined.set(chunk, offset);
    offset += chunk.length;
  }
  return combined;
}

/**
 * UTF-32 encoder for building test input
 */
export function encodeUtf32(text: string, littleEndian: boolean): Uint8Array {
  const codePoints = Array.from(text, (char) => char.codePointAt(0) ?? 0);
  const out = new Uint8Array(codePoints.length * 4);
  const view = new DataView(out.buffer);
  codePoints.forEach((codePoint, index) => {
    view.setUint32(index * 4, codePoint, littleEndian);
  });
  return out;
}

/**
 * Pool that allocates exactly what is asked and records every call
 */
export class CountingPool implements ByteArrayPool {
  readonly rented: Uint8Array[] = [];
  readonly returned: Uint8Array[] = [];

  rent(minimumLength: number): Uint8Array {
    const buffer = new Uint8Array(minimumLength);
    this.rented.push(buffer);
    return buffer;
  }

  return(buffer: Uint8Array): void {
    this.returned.push(buffer);
  }

  get outstanding(): number {
    return this.rented.length - this.returned.length;
  }
}

/**
 * Sink that keeps a copy of every chunk, optionally failing once it has
 * accepted `afterWrites` chunks
 */
export class RecordingSink implements ContentSink {
  readonly chunks: Uint8Array[] = [];

  constructor(private readonly failure?: { afterWrites: number; error: unknown }) {}

  write(chunk: Uint8Array): void {
    this.check();
    this.chunks.push(chunk.slice());
  }

  async writeAsync(chunk: Uint8Array, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw createCanceledError(signal.reason);
    }
    this.write(chunk);
  }

  bytes(): Uint8Array {
    return concatBytes(this.chunks);
  }

  text(): string {
    return new TextDecoder().decode(this.bytes());
  }

  private check(): void {
    if (this.failure && this.chunks.length >= this.failure.afterWrites) {
      throw this.failure.error;
    }
  }
}

export interface ScriptedWriterOptions {
  chunks: Uint8Array[];
  /** Offer writeTo (default true) */
  sync?: boolean;
  /** Reported by tryComputeLength */
  length?: number | null;
  /** Throw `error` instead of writing chunk number `atChunk` */
  failure?: { atChunk: number; error: unknown };
  /** Called before each chunk is written */
  onChunk?: (index: number) => void;
  /** Awaited before the first asynchronous write */
  gate?: Promise<void>;
  /** Offer tryOpenStream and openStreamAsync over the chunks */
  streams?: boolean;
}

/**
 * Writer that emits a fixed list of chunks and counts its calls
 */
export class ScriptedWriter implements ContentWriter {
  writeCalls = 0;
  lengthCalls = 0;
  streamCalls = 0;

  writeTo?: (sink: ContentSink, signal?: AbortSignal) => void;
  tryOpenStream?: () => ReadableStream<Uint8Array> | null;
  openStreamAsync?: (signal?: AbortSignal) => Promise<ReadableStream<Uint8Array>>;

  constructor(private readonly options: ScriptedWriterOptions) {
    if (options.sync !== false) {
      this.writeTo = (sink) => {
        this.writeCalls++;
        options.chunks.forEach((chunk, index) => {
          this.before(index);
          sink.write(chunk);
        });
        this.before(options.chunks.length);
      };
    }
    if (options.streams) {
      this.tryOpenStream = () => {
        this.streamCalls++;
        return this.chunkStream();
      };
      this.openStreamAsync = async () => {
        this.streamCalls++;
        return this.chunkStream();
      };
    }
  }

  async writeToAsync(sink: ContentSink, signal?: AbortSignal): Promise<void> {
    this.writeCalls++;
    if (this.options.gate) {
      await this.options.gate;
    }
    for (let index = 0; index < this.options.chunks.length; index++) {
      this.before(index);
      await sink.writeAsync(this.options.chunks[index] ?? new Uint8Array(0), signal);
    }
    this.before(this.options.chunks.length);
  }

  tryComputeLength(): number | null {
    this.lengthCalls++;
    return this.options.length ?? null;
  }

  private before(index: number): void {
    if (index < this.options.chunks.length) {
      this.options.onChunk?.(index);
    }
    if (this.options.failure?.atChunk === index) {
      throw this.options.failure.error;
    }
  }

  private chunkStream(): ReadableStream<Uint8Array> {
    const chunks = [...this.options.chunks];
    return new ReadableStream<Uint8Array>({
      pull(controller) {
        const next = chunks.shift();
        if (next) {
          controller.enqueue(next);
        } else {
          controller.close();
        }
      },
    });
  }
}

/**
 * Promise with its resolver exposed, for holding a writer mid-flight
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Run `fn` and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

/**
 * Await `promise` and return its rejection reason
 */
export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}
