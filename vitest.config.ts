import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'merkle-audit',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
  },
});
