import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Global test settings
    globals: true,

    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist', '**/examples/**'],

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,

    // Mock reset
    clearMocks: true,
  },
});
