import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/tests/**/*.test.ts'],
    env: {
      LOG_TO_FILE: '0',
      LOG_LEVEL: 'warn',
    },
  },
});
