import { constants } from 'node:buffer';

/** Largest maxBufferSize a body accepts (2^31 - 1) */
export const MAX_BUFFER_SIZE = 0x7fffffff;

/** Starting capacity of a pooled buffer when the length is unknown */
export const DEFAULT_INITIAL_CAPACITY = 256;

/** Largest Uint8Array the runtime will allocate */
export const PLATFORM_MAX_LENGTH = constants.MAX_LENGTH;
