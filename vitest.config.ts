import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    environment: 'node',
    env: {
      GATEHOUSE_LOG_LEVEL: 'silent',
    },
    testTimeout: 20000,
  },
});
