import { defineConfig } from 'vitest/config';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@threatcheck/security': resolve(root, 'packages/security/src'),
      '@threatcheck/environments': resolve(root, 'packages/environments/src'),
    },
  },
  test: {
    include: ['packages/**/*.test.ts', 'services/**/*.test.ts'],
    exclude: ['**/node_modules/**'],
    globals: false,
  },
});
