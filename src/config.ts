/**
 * Application Configuration
 *
 * Settings are read from the environment on first access, parsed by a
 * zod schema and cached. Invalid values throw on that first access. Every
 * setting has a default, so an empty environment is valid.
 */

import { z } from 'zod';
import { DEFAULT_INITIAL_CAPACITY, MAX_BUFFER_SIZE } from './buffer/constants.js';

/**
 * Empty environment values count as unset
 */
function unsetIfEmpty(value: unknown): unknown {
  return value === '' ? undefined : value;
}

function envInteger(min: number, max: number, defaultValue: number) {
  return z.preprocess(
    unsetIfEmpty,
    z.coerce
      .number()
      .int('must be an integer')
      .min(min, `must be at least ${min}`)
      .max(max, `must not exceed ${max}`)
      .default(defaultValue)
  );
}

const envSchema = z.object({
  CONTENT_MAX_BUFFER_SIZE: envInteger(0, MAX_BUFFER_SIZE, MAX_BUFFER_SIZE),
  CONTENT_INITIAL_BUFFER_SIZE: envInteger(1, MAX_BUFFER_SIZE, DEFAULT_INITIAL_CAPACITY),
  CONTENT_STREAM_CHUNK_SIZE: envInteger(1, MAX_BUFFER_SIZE, 65536),
  CONTENT_BUFFER_POOL_ENABLED: z.preprocess(
    unsetIfEmpty,
    z
      .enum(['true', 'false', '1', '0'])
      .default('true')
      .transform((value) => value === 'true' || value === '1')
  ),
  CONTENT_LOG_LEVEL: z.preprocess(
    unsetIfEmpty,
    z.enum(['none', 'error', 'warn', 'info', 'debug']).default('warn')
  ),
});

export interface AppConfig {
  /** Default cap for loadIntoBuffer when the caller passes none */
  maxBufferSize: number;
  /** Starting capacity of pooled buffers for bodies of unknown length */
  initialBufferSize: number;
  /** Chunk size used when a buffered body is exposed as a stream */
  streamChunkSize: number;
  /** Rent growable buffer storage from the shared pool */
  bufferPoolEnabled: boolean;
  logLevel: 'none' | 'error' | 'warn' | 'info' | 'debug';
}

/**
 * Validate and load configuration from the environment
 *
 * @throws {Error} If any variable is present but invalid
 */
function loadConfig(): AppConfig {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const env = result.data;
  return {
    maxBufferSize: env.CONTENT_MAX_BUFFER_SIZE,
    initialBufferSize: env.CONTENT_INITIAL_BUFFER_SIZE,
    streamChunkSize: env.CONTENT_STREAM_CHUNK_SIZE,
    bufferPoolEnabled: env.CONTENT_BUFFER_POOL_ENABLED,
    logLevel: env.CONTENT_LOG_LEVEL,
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Reset cached configuration (useful for testing)
 * @internal
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Get application configuration
 *
 * @example
 * ```ts
 * import { getConfig } from './config.js';
 *
 * const body = new ContentBody(writer);
 * await body.loadIntoBufferAsync(getConfig().maxBufferSize);
 * ```
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export default getConfig;
