/**
 * Pool Type Definitions
 */

/**
 * Source of reusable byte arrays
 *
 * Injected into bodies and buffers so tests can substitute a deterministic
 * pool. The process-wide default is getBufferPool().
 */
export interface ByteArrayPool {
  /**
   * Rent an array of at least `minimumLength` bytes.
   * The array may be longer than requested and its contents are unspecified.
   */
  rent(minimumLength: number): Uint8Array;
  /**
   * Return an array obtained from rent(). Each rented array is returned at
   * most once; arrays the pool does not recognise are dropped.
   */
  return(buffer: Uint8Array): void;
}
