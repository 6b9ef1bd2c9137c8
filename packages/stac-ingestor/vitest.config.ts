import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'stac-ingestor',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
  },
});
