import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['jira/typescript/src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
