/**
 * Streaming Module
 *
 * Stream views over buffered bodies, sinks over Node writables, and the
 * reference writers for bytes and web streams.
 */

export * from './buffer-stream.js';
export * from './writable-sink.js';
export * from './writers.js';
