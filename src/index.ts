/**
 * HTTP body engine
 *
 * Bounded buffering, charset-aware text decoding and cancellable transfer
 * for HTTP message bodies.
 */

export * from './content/index.js';
export * from './buffer/index.js';
export * from './encoding/index.js';
export * from './transfer/index.js';
export * from './streaming/index.js';
export * from './pool/index.js';
export {
  ContentError,
  ContentErrorType,
  IOError,
  ObjectDisposedError,
  isContentError,
} from './utils/errors.js';
export type { ContentErrorDetails } from './utils/errors.js';
export { logger, setLogLevel } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
export { registerTeardown } from './utils/cancellation.js';
export type { TeardownRegistration } from './utils/cancellation.js';
export { getConfig, resetConfig } from './config.js';
export type { AppConfig } from './config.js';
