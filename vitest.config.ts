import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      PROCFLOW_LOG_FORMAT: 'json',
      PROCFLOW_LOG_LEVEL: 'error',
    },
  },
});
