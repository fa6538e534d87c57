import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/tests/**/*.test.ts',
      'packages/*/src/**/__tests__/*.test.ts',
      'services/*/tests/**/*.test.ts',
      'workers/*/tests/**/*.test.ts'
    ],
    env: {
      LOG_LEVEL: 'silent'
    },
    testTimeout: 15000
  },
  resolve: {
    alias: {
      '@ragops/core': path.resolve(__dirname, 'packages/ops-core/src'),
      '@ragops/test-utils': path.resolve(__dirname, 'packages/ops-test-utils/src')
    }
  }
});
