import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // worker-thread renders start a tsx loader per worker
    testTimeout: 30000
  }
});
