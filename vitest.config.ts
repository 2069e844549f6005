import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['server/test/**/*.test.ts'],
    environment: 'node',
    // logging writes through pino; keep test output to the reporter
    env: { LOG_LEVEL: 'error' },
  },
});
