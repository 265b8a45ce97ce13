import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Tests mutate process.env; keep files serial.
    fileParallelism: false,
    pool: 'threads',
    maxWorkers: 1,
    testTimeout: 30_000,
  },
});
