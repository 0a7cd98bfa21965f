import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolve = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@gitglance/core': resolve('./packages/core/src/index.ts'),
    },
  },
  test: {
    testTimeout: 30000,
    include: ['packages/*/src/test/**/*.test.ts'],
  },
});
