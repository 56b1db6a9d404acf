import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for the evaluation service
 *
 * Unit tests mock `src/db/index.js`; integration tests mock the services and
 * drive the Express app through supertest. Nothing reaches a real database.
 */
export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/server.ts', 'src/db/seed.ts'],
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    clearMocks: true,
    mockReset: true,
    restoreMocks: true,
  },
});
