import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const isWindows = process.platform === 'win32';

export default defineConfig({
  resolve: {
    alias: {
      '@quire/core': fileURLToPath(
        new URL('./packages/core/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    testTimeout: 30000,
    teardownTimeout: 10000,
    pool: isWindows ? 'forks' : undefined,
  },
});
