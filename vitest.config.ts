import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Unit tests live under test/ and run in a plain Node.js environment.
 * Everything a test needs (pools, sinks, writers) is faked in process.
 */
export default defineConfig({
  test: {
    globals: true,

    // Test environment: Node.js environment for server-side code
    environment: 'node',

    include: ['test/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts'],
    },
    setupFiles: ['./test/setup.ts'],
  },
});
