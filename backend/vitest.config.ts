import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    // sql.js loads a WASM SQLite per worker; keep each file in its own process
    pool: 'forks',
    testTimeout: 10_000,
    clearMocks: true,
    restoreMocks: true,
  },
});
