import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Global test settings
    globals: true,

    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/__tests__/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
