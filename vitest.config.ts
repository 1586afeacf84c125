import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    reporters: 'default',
    include: ['services/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    testTimeout: 15_000,
  },
});
