/**
 * Vitest Configuration for Unit Tests
 *
 * SCOPE: Fast unit tests. SQLite runs in-memory, file stores use temp dirs.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'tally-witness',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
    environment: 'node',
    // Unit tests must be deterministic
    retry: 0,
  },
});
