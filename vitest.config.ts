import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'warn',
    },
  },
});
