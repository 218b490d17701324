import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: [
      'datafeed-aggregations/typescript/tests/**/*.test.ts',
      'datafeed-aggregations/typescript/src/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: ['node_modules', 'dist', '**/examples/**'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['datafeed-aggregations/typescript/src/**/*.ts'],
      exclude: ['**/index.ts', '**/types/**'],
    },

    testTimeout: 10000,

    // Watch mode
    watch: false,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
