/**
 * Generic Object Pool - Reuse frequently allocated objects to reduce GC pressure
 *
 * Objects are created on demand, reset and validated on their way back, and
 * counted for the buffer pool's tier metrics.
 *
 * Acquisition never waits: when every pooled object is in use and the pool
 * is full, a fresh unpooled object is handed out instead. Buffers are
 * acquired from inside synchronous write paths, so the pool cannot suspend.
 */

/**
 * Configuration options for the object pool
 */
export interface ObjectPoolOptions<T> {
  /** Factory function to create new objects */
  factory: () => T;
  /** Function to reset objects when returned to pool (optional) */
  reset?: (obj: T) => void;
  /** Function to validate objects before reuse (optional) */
  validate?: (obj: T) => boolean;
  /** Maximum number of objects to pool (default: 100) */
  maxSize?: number;
}

/**
 * Object pool metrics
 */
export interface ObjectPoolMetrics {
  /** Current pool size */
  poolSize: number;
  /** Number of pooled objects currently in use */
  inUseCount: number;
  /** Number of idle objects */
  idleCount: number;
  /** Total number of times objects were acquired */
  totalAcquisitions: number;
  /** Total number of times objects were released */
  totalReleases: number;
  /** Total number of objects created */
  totalCreated: number;
  /** Total number of objects dropped (invalid, failed reset or pool full) */
  totalDestroyed: number;
  /** Number of times the pool was exhausted and handed out an unpooled object */
  poolExhaustedCount: number;
  /** Current pool utilization percentage (0-100) */
  utilization: number;
}

/**
 * Generic Object Pool for reusing objects
 */
export class ObjectPool<T> {
  private idle: T[] = [];
  private inUse = new Set<T>();

  // Configuration
  private readonly factory: () => T;
  private readonly reset?: (obj: T) => void;
  private readonly validate?: (obj: T) => boolean;
  private readonly maxSize: number;

  // State
  private isShutdown = false;
  private totalAcquisitions = 0;
  private totalReleases = 0;
  private totalCreated = 0;
  private totalDestroyed = 0;
  private poolExhaustedCount = 0;

  constructor(options: ObjectPoolOptions<T>) {
    this.factory = options.factory;
    this.reset = options.reset;
    this.validate = options.validate;
    this.maxSize = options.maxSize ?? 100;

    // Validate configuration
    if (!Number.isInteger(this.maxSize) || this.maxSize < 0) {
      throw new Error('maxSize must be a non-negative integer');
    }
    if (typeof this.factory !== 'function') {
      throw new Error('factory function is required');
    }
  }

  /**
   * Acquire an object from the pool
   * Creates a new object if none are idle
   */
  acquire(): T {
    if (this.isShutdown) {
      throw new Error('Object pool is shutdown');
    }

    this.totalAcquisitions++;

    // Try to find an idle, valid object
    let candidate = this.idle.pop();
    while (candidate !== undefined) {
      if (!this.validate || this.validate(candidate)) {
        this.inUse.add(candidate);
        return candidate;
      }
      this.totalDestroyed++;
      candidate = this.idle.pop();
    }

    const obj = this.factory();
    this.totalCreated++;

    if (this.inUse.size < this.maxSize) {
      this.inUse.add(obj);
    } else {
      // Pool is exhausted; this object is adopted on release if there is room
      this.poolExhaustedCount++;
    }
    return obj;
  }

  /**
   * Release an object back to the pool
   *
   * Releasing an object that is already idle is a no-op, so an object can
   * never be handed to two holders at once.
   */
  release(obj: T): void {
    if (this.isShutdown || this.idle.includes(obj)) {
      return;
    }

    const tracked = this.inUse.delete(obj);
    if (!tracked && this.inUse.size + this.idle.length >= this.maxSize) {
      // Unpooled object and no room to adopt it
      this.totalDestroyed++;
      return;
    }

    if (this.reset) {
      try {
        this.reset(obj);
      } catch {
        // Reset failed; the object is not reusable
        this.totalDestroyed++;
        return;
      }
    }

    this.totalReleases++;
    this.idle.push(obj);
  }

  /**
   * Get current pool metrics
   */
  getMetrics(): ObjectPoolMetrics {
    const inUseCount = this.inUse.size;
    const idleCount = this.idle.length;

    return {
      poolSize: inUseCount + idleCount,
      inUseCount,
      idleCount,
      totalAcquisitions: this.totalAcquisitions,
      totalReleases: this.totalReleases,
      totalCreated: this.totalCreated,
      totalDestroyed: this.totalDestroyed,
      poolExhaustedCount: this.poolExhaustedCount,
      utilization: this.maxSize > 0 ? (inUseCount / this.maxSize) * 100 : 0,
    };
  }

  /**
   * Shutdown the pool and clear all objects
   */
  shutdown(): void {
    if (this.isShutdown) {
      return;
    }
    this.isShutdown = true;
    this.idle = [];
    this.inUse.clear();
  }
}
