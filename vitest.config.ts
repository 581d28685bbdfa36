import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      DESKFLOW_LOG_LEVEL: 'error',
    },
    testTimeout: 10000,
  },
});
