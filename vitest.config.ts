import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // The package's runtime export is its build output; tests run the sources.
    alias: {
      '@imgcast/core': fileURLToPath(new URL('./packages/imgcast-core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
});
