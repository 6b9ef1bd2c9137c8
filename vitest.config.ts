import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['packages/stac-ingestor/src/__tests__/setup.ts'],
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
    environment: 'node',
  },
});
