import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    // PGlite boots a WASM Postgres per test file
    hookTimeout: 30_000,
    testTimeout: 30_000,
    env: {
      SESSION_SECRET: 'test-secret',
      LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    // Support .js extension imports in ESM TypeScript source
    extensions: ['.ts', '.js'],
  },
});
