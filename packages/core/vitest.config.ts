import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    root: dirname,
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@alphametic/core': path.resolve(dirname, './src/index.ts'),
    },
  },
});
