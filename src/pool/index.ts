/**
 * Pool Module
 *
 * Exports the generic object pool and the shared byte-array pool used by
 * growable body buffers.
 */

export { ObjectPool } from './ObjectPool.js';
export { BufferPool, getBufferPool, resetBufferPool, unpooledAllocator } from './BufferPool.js';
export type { ObjectPoolOptions, ObjectPoolMetrics } from './ObjectPool.js';
export type { BufferSizeTier, BufferPoolMetrics, BufferPoolOptions } from './BufferPool.js';
export type { ByteArrayPool } from './types.js';
