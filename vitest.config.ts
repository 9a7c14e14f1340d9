import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['graphite/typescript/src/**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['graphite/typescript/src/**/*.ts'],
      exclude: ['**/__tests__/**', 'graphite/typescript/src/testing/**'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
