import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      NODE_ENV: 'test',
      SPRINTDECK_LOG_LEVEL: 'fatal',
    },
  },
});
