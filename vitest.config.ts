import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@opstore/lib-core': fileURLToPath(new URL('./packages/lib-core/src/index.ts', import.meta.url)),
      '@opstore/token-cleanup': fileURLToPath(
        new URL('./packages/token-cleanup/src/index.ts', import.meta.url)
      ),
    },
  },
});
