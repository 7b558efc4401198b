import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['orchestrator/tests/**/*.test.ts', 'upload-gateway/tests/**/*.test.ts'],
    testTimeout: 10_000
  }
});
