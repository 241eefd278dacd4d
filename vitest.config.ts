import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // The scripted engine and extracted-script temp dirs are process-wide.
    fileParallelism: false,
    pool: 'threads',
    maxWorkers: 1,
    testTimeout: 30_000,
  },
});
