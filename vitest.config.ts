import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for lexlocator
 *
 * Every test runs in process: SQLite databases are in-memory or under the
 * OS temp directory, and providers are replaced by deterministic fakes from
 * test/helpers.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    // better-sqlite3 is a native addon; forks keep each file in its own process.
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
        isolate: true,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
