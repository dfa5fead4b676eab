import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'brahms-sync',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 10000,
    pool: 'forks',
    globals: true,
    environment: 'node',
  },
});
