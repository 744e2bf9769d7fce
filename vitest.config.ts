import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/tests/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
