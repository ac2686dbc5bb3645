import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    globals: false,
    testTimeout: 20_000,
    env: {
      MESHCTL_LOG_LEVEL: 'silent',
    },
  },
});
