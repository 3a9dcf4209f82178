import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    // Tests share REVUE_HOME and temp directories
    fileParallelism: false,
  },
});
