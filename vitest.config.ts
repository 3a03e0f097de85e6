import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/**/*.test.ts'],
    // PGlite boots a full Postgres in wasm for each test file
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
