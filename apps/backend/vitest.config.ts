import { defineConfig } from 'vitest/config';

// Keep the suite quiet: the JSON logger writes straight to stdout/stderr.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    hookTimeout: 20_000,
    isolate: true,
  },
});
