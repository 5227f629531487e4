import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['services/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
