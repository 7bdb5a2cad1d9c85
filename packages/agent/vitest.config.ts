import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'agent',
    root: dirname,
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@sweepmind/core': path.resolve(dirname, '../core/src/index.ts'),
      '@sweepmind/agent': path.resolve(dirname, './src/index.ts'),
    },
  },
});
