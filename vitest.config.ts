import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['scripts/**/*.test.ts', 'backend/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
