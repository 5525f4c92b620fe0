import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      // Never touch the on-disk database
      TAGGING_DB_PATH: ':memory:',
    },
  },
});
