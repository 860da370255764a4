import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'packages/*/src/__tests__/**/*.test.ts',
      'sdk/src/__tests__/**/*.test.ts',
      'api/src/__tests__/**/*.test.ts',
    ],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      DATABASE_PATH: ':memory:',
    },
  },
});
