import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@xferctl/kernel': fromRoot('./packages/kernel/src/index.ts'),
      '@xferctl/runtime-host': fromRoot('./packages/runtime-host/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    testTimeout: 15_000,
  },
});
