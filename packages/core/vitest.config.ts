import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Disable file watching by default
    watch: false,
    include: ['src/**/__tests__/**/*.test.ts'],
    // Tests share the OS temp directory, keep them in one process
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    // Clear mocks between tests
    clearMocks: true,
    isolate: true,
    reporters: ['default'],
  },
});
