/**
 * Bounded Buffers
 *
 * In-memory byte containers that materialize a body without ever growing
 * past a caller-supplied maximum. Two variants exist:
 *
 * - FixedCapacityBuffer: pre-sized to a declared length, plain allocations.
 * - PooledGrowableBuffer: unknown length, storage rented from a pool and
 *   grown geometrically.
 *
 * A write that would exceed the maximum fails before anything is copied, so
 * a buffer never holds truncated content.
 */

import type { ContentSink } from '../content/types.js';
import type { ByteArrayPool } from '../pool/types.js';
import {
  createAlreadyDisposedError,
  createCanceledError,
  createCapacityExceededError,
} from '../utils/errors.js';
import { DEFAULT_INITIAL_CAPACITY, PLATFORM_MAX_LENGTH } from './constants.js';

/**
 * Common surface of both buffer variants
 */
export interface BoundedBuffer extends ContentSink {
  /** Number of bytes written */
  readonly length: number;
  /** Size of the backing store */
  readonly capacity: number;
  /** Largest length the buffer accepts */
  readonly maxSize: number;
  readonly isDisposed: boolean;
  /** Copy of the content, sized exactly to `length` */
  toOwnedCopy(): Uint8Array;
  /** View aliasing the backing store, or null when the variant cannot offer one */
  asZeroCopyView(): Uint8Array | null;
  /** Release the backing store; further calls do nothing */
  dispose(): void;
}

/**
 * New capacity when growing from `current` to hold at least `required` bytes
 */
export function nextCapacity(current: number, required: number): number {
  const doubled = Math.min(current * 2, PLATFORM_MAX_LENGTH);
  return Math.max(required, doubled);
}

abstract class BufferBase implements BoundedBuffer {
  protected store: Uint8Array;
  protected size = 0;
  private disposed = false;

  protected constructor(
    public readonly maxSize: number,
    store: Uint8Array
  ) {
    this.store = store;
  }

  get length(): number {
    return this.size;
  }

  get capacity(): number {
    return this.store.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  write(chunk: Uint8Array): void {
    this.ensureNotDisposed();
    const required = this.size + chunk.length;
    if (required > this.maxSize) {
      throw createCapacityExceededError(this.maxSize);
    }
    if (required > this.store.length) {
      this.grow(required);
    }
    this.store.set(chunk, this.size);
    this.size = required;
  }

  async writeAsync(chunk: Uint8Array, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw createCanceledError(signal.reason);
    }
    this.write(chunk);
  }

  toOwnedCopy(): Uint8Array {
    this.ensureNotDisposed();
    return this.store.slice(0, this.size);
  }

  abstract asZeroCopyView(): Uint8Array | null;

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.releaseStore(this.store);
    this.store = new Uint8Array(0);
    this.size = 0;
  }

  protected ensureNotDisposed(): void {
    if (this.disposed) {
      throw createAlreadyDisposedError(this.constructor.name);
    }
  }

  protected abstract grow(required: number): void;

  protected abstract releaseStore(store: Uint8Array): void;
}

/**
 * Buffer pre-sized to a known length
 *
 * If the writer produces more than the declared length the store grows by
 * plain allocation, still bounded by `maxSize`.
 */
export class FixedCapacityBuffer extends BufferBase {
  constructor(maxSize: number, capacity: number) {
    if (capacity > maxSize) {
      throw createCapacityExceededError(maxSize);
    }
    super(maxSize, new Uint8Array(capacity));
  }

  /**
   * The backing store itself, when the content fills it exactly
   */
  asZeroCopyView(): Uint8Array | null {
    this.ensureNotDisposed();
    return this.size === this.store.length ? this.store : null;
  }

  protected grow(required: number): void {
    const next = new Uint8Array(Math.min(nextCapacity(this.store.length, required), this.maxSize));
    next.set(this.store.subarray(0, this.size));
    this.store = next;
  }

  protected releaseStore(): void {
    // Plain allocation; dropping the reference is enough
  }
}

/**
 * Growable buffer whose storage is rented from a pool
 */
export class PooledGrowableBuffer extends BufferBase {
  constructor(
    maxSize: number,
    private readonly pool: ByteArrayPool,
    initialCapacity: number = DEFAULT_INITIAL_CAPACITY
  ) {
    super(maxSize, pool.rent(Math.min(initialCapacity, maxSize)));
  }

  /**
   * Pool-owned storage is never handed out by reference
   */
  asZeroCopyView(): null {
    return null;
  }

  protected grow(required: number): void {
    const current = this.store;
    // Past PLATFORM_MAX_LENGTH the allocation below throws the runtime's RangeError
    const next = this.pool.rent(nextCapacity(current.length, required));
    next.set(current.subarray(0, this.size));
    this.store = next;
    this.pool.return(current);
  }

  protected releaseStore(store: Uint8Array): void {
    this.pool.return(store);
  }
}

/**
 * Create the buffer variant matching what is known about the body
 *
 * @param maxSize - Largest accepted length
 * @param declaredLength - Declared body length, or null when unknown
 * @param pool - Storage source for the growable variant
 * @param initialCapacity - Starting capacity of the growable variant
 */
export function createBoundedBuffer(
  maxSize: number,
  declaredLength: number | null,
  pool: ByteArrayPool,
  initialCapacity: number = DEFAULT_INITIAL_CAPACITY
): BoundedBuffer {
  if (declaredLength !== null) {
    return new FixedCapacityBuffer(maxSize, declaredLength);
  }
  return new PooledGrowableBuffer(maxSize, pool, initialCapacity);
}
