/**
 * Buffer Pool - Shared pool of byte arrays for growable body buffers
 *
 * Provides buffer pooling with:
 * - Power-of-two size tiers from 256 bytes to 1 MiB
 * - Automatic buffer zeroing on return
 * - Per-size-tier metrics tracking
 *
 * Requests larger than the biggest tier are served with plain allocations
 * that are simply dropped when returned.
 */

import { ObjectPool, type ObjectPoolMetrics } from './ObjectPool.js';
import type { ByteArrayPool } from './types.js';

/**
 * Buffer size tier configuration
 */
export interface BufferSizeTier {
  /** Buffer size in bytes */
  size: number;
  /** Maximum number of buffers to pool (default: 32) */
  maxSize?: number;
}

/**
 * Buffer pool options
 */
export interface BufferPoolOptions {
  /** Buffer size tiers (default: powers of two from 256 B to 1 MiB) */
  tiers?: BufferSizeTier[];
  /** Zero buffers when they are returned (default: true) */
  clearOnReturn?: boolean;
}

/**
 * Buffer pool metrics
 */
export interface BufferPoolMetrics {
  /** Metrics per buffer size tier */
  tiers: {
    /** Buffer size in bytes */
    size: number;
    /** Object pool metrics for this tier */
    metrics: ObjectPoolMetrics;
  }[];
  /** Total buffers across all tiers */
  totalBuffers: number;
  /** Total buffers in use across all tiers */
  totalInUse: number;
  /** Total bytes held across all tiers */
  totalBytes: number;
  /** Rentals served outside the tiers */
  unpooledRentals: number;
}

function defaultTiers(): BufferSizeTier[] {
  const tiers: BufferSizeTier[] = [];
  for (let size = 256; size <= 1024 * 1024; size *= 2) {
    // Keep fewer of the large arrays around
    tiers.push({ size, maxSize: size <= 64 * 1024 ? 32 : 8 });
  }
  return tiers;
}

/**
 * Buffer Pool for reusing Uint8Array buffers
 */
export class BufferPool implements ByteArrayPool {
  private pools: Map<number, ObjectPool<Uint8Array>> = new Map();
  private readonly tierSizes: number[];
  private unpooledRentals = 0;

  constructor(options: BufferPoolOptions = {}) {
    const tiers = options.tiers ?? defaultTiers();
    const clearOnReturn = options.clearOnReturn ?? true;

    for (const tier of tiers) {
      const pool = new ObjectPool<Uint8Array>({
        factory: () => new Uint8Array(tier.size),
        reset: clearOnReturn ? (buffer) => buffer.fill(0) : undefined,
        validate: (buffer) => buffer.byteLength === tier.size,
        maxSize: tier.maxSize ?? 32,
      });
      this.pools.set(tier.size, pool);
    }

    this.tierSizes = [...this.pools.keys()].sort((a, b) => a - b);
  }

  /**
   * Rent a buffer of at least the specified size
   * Returns a buffer from the smallest tier that fits
   */
  rent(minimumLength: number): Uint8Array {
    if (!Number.isInteger(minimumLength) || minimumLength < 0) {
      throw new RangeError(`Invalid buffer length: ${minimumLength}`);
    }

    const tierSize = this.findTierSize(minimumLength);
    const pool = tierSize === null ? undefined : this.pools.get(tierSize);
    if (!pool) {
      this.unpooledRentals++;
      return new Uint8Array(minimumLength);
    }
    return pool.acquire();
  }

  /**
   * Return a buffer to the pool
   */
  return(buffer: Uint8Array): void {
    // Only whole arrays can be pooled; views over a larger store are dropped
    if (buffer.byteOffset !== 0 || buffer.buffer.byteLength !== buffer.byteLength) {
      return;
    }
    this.pools.get(buffer.byteLength)?.release(buffer);
  }

  /**
   * Find the smallest tier size that can accommodate the requested size
   */
  private findTierSize(size: number): number | null {
    for (const tierSize of this.tierSizes) {
      if (tierSize >= size) {
        return tierSize;
      }
    }
    return null;
  }

  /**
   * Get current pool metrics
   */
  getMetrics(): BufferPoolMetrics {
    const tiers: BufferPoolMetrics['tiers'] = [];
    let totalBuffers = 0;
    let totalInUse = 0;
    let totalBytes = 0;

    for (const size of this.tierSizes) {
      const pool = this.pools.get(size);
      if (!pool) continue;
      const metrics = pool.getMetrics();
      tiers.push({ size, metrics });

      totalBuffers += metrics.poolSize;
      totalInUse += metrics.inUseCount;
      totalBytes += metrics.poolSize * size;
    }

    return {
      tiers,
      totalBuffers,
      totalInUse,
      totalBytes,
      unpooledRentals: this.unpooledRentals,
    };
  }

  /**
   * Get metrics for a specific buffer size tier
   */
  getTierMetrics(size: number): ObjectPoolMetrics | null {
    return this.pools.get(size)?.getMetrics() ?? null;
  }

  /**
   * Shutdown all buffer pools
   */
  shutdown(): void {
    for (const pool of this.pools.values()) {
      pool.shutdown();
    }
    this.pools.clear();
    this.tierSizes.length = 0;
  }
}

/**
 * Pool that never reuses anything; used when pooling is disabled
 */
export const unpooledAllocator: ByteArrayPool = {
  rent: (minimumLength) => new Uint8Array(minimumLength),
  return: () => {},
};

// Global buffer pool instance
let globalBufferPool: BufferPool | null = null;

/**
 * Get the global buffer pool instance
 */
export function getBufferPool(options?: BufferPoolOptions): BufferPool {
  if (!globalBufferPool) {
    globalBufferPool = new BufferPool(options);
  }
  return globalBufferPool;
}

/**
 * Reset the global buffer pool instance
 */
export function resetBufferPool(): void {
  if (globalBufferPool) {
    globalBufferPool.shutdown();
    globalBufferPool = null;
  }
}
