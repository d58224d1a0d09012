/**
 * Vitest Configuration
 *
 * SCOPE: Unit and regression tests. Everything runs in process: temp
 * directories for file stores, `:memory:` SQLite for the adapter cache.
 *
 * USAGE: npm test
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'curator',

    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    setupFiles: ['src/__tests__/setup.ts'],

    // File locks and temp directories; one process per file
    pool: 'forks',
    isolate: true,

    testTimeout: 10_000,
    hookTimeout: 10_000,

    globals: true,
    environment: 'node',

    retry: 0,
  },
});
