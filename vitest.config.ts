import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'data-searches',
    include: ['packages/*/src/__tests__/unit/**/*.test.ts'],
    exclude: ['node_modules', '**/dist/**'],
    testTimeout: 30000,
    pool: 'forks',
    environment: 'node',
  },
});
