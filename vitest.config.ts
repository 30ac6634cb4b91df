import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/tests/**/*.spec.ts'],
    testTimeout: 10_000,
  },
});
