/**
 * Content Types and Interfaces
 *
 * Boundary types between the body engine and its collaborators: the writer
 * that produces a body's bytes, the sink those bytes are copied to, and the
 * header values that describe the body.
 */

import type { ReadableStream } from 'node:stream/web';

/**
 * Destination for body bytes
 */
export interface ContentSink {
  /** Write a chunk synchronously */
  write(chunk: Uint8Array): void;
  /** Write a chunk, resolving once the sink accepted it */
  writeAsync(chunk: Uint8Array, signal?: AbortSignal): Promise<void>;
}

/**
 * Producer of a body's bytes
 *
 * Implemented by format-specific bodies. The engine calls a write method at
 * most once per materialization attempt.
 */
export interface ContentWriter {
  /** Write the whole body into the sink synchronously (optional) */
  writeTo?(sink: ContentSink, signal?: AbortSignal): void;
  /** Write the whole body into the sink */
  writeToAsync(sink: ContentSink, signal?: AbortSignal): Promise<void>;
  /** Length of the body in bytes, or null when it cannot be known up front */
  tryComputeLength?(): number | null;
  /** Open the body as a stream without buffering, or null to fall back to buffering */
  tryOpenStream?(): ReadableStream<Uint8Array> | null;
  /** Open the body as a stream asynchronously without buffering */
  openStreamAsync?(signal?: AbortSignal): Promise<ReadableStream<Uint8Array>>;
}

/**
 * Header values the engine consults
 *
 * Parsed by a header collection elsewhere; the engine never reads header syntax.
 */
export interface ContentHeaders {
  /** Declared Content-Length */
  contentLength?: number | null;
  /** charset parameter of Content-Type, possibly still quoted */
  charset?: string | null;
}

/**
 * Readable handle kept by a body once a stream was handed out
 */
export interface StreamHandle {
  stream: ReadableStream<Uint8Array>;
  /** Tear the stream down; safe to call more than once */
  release(reason: unknown): void;
}

/**
 * Read-stream slot of a body
 */
export type ReadStreamState =
  | { kind: 'empty' }
  | { kind: 'stream'; handle: StreamHandle }
  | {
      kind: 'pending';
      promise: Promise<ReadableStream<Uint8Array>>;
      /** Set once the promise fulfilled */
      resolved: StreamHandle | null;
    };
