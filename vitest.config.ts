import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@tftpx/core': fileURLToPath(new URL('./packages/tftpx-core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'cli/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
  },
});
