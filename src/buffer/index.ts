export {
  FixedCapacityBuffer,
  PooledGrowableBuffer,
  createBoundedBuffer,
  nextCapacity,
} from './BoundedBuffer.js';
export type { BoundedBuffer } from './BoundedBuffer.js';
export { MAX_BUFFER_SIZE, DEFAULT_INITIAL_CAPACITY, PLATFORM_MAX_LENGTH } from './constants.js';
