import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'payments-map',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 10_000,
    pool: 'forks',
  },
});
