import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'services/*/src/**/*.test.ts',
      'examples/*/src/**/*.test.ts',
    ],
    environment: 'node',
    env: { LOG_LEVEL: 'silent' },
    testTimeout: 10_000,
  },
});
