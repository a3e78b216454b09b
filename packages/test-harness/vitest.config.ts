import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  root: resolve(__dirname, '..', '..'),
  resolve: {
    alias: {
      '@vocalis/core': resolve(__dirname, '../core/src/index.ts'),
      '@vocalis/platform': resolve(__dirname, '../platform/src/index.ts'),
    },
  },
  test: {
    include: ['packages/test-harness/src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      all: true,
      include: ['packages/core/src/**/*.ts', 'packages/platform/src/**/*.ts'],
    },
  },
});
