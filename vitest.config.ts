import { defineConfig } from 'vitest/config';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Keep pino quiet and off the worker-thread transport during tests
    env: {
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'threads',
  },
  resolve: {
    alias: {
      '@taskforge/core': resolve(root, 'packages/core/src/index.ts'),
      '@taskforge/cli': resolve(root, 'packages/cli/src/index.ts'),
    },
  },
  esbuild: {
    target: 'node20',
  },
});
