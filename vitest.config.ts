import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    include: [
      'packages/**/src/**/*.{test,spec}.ts',
      'examples/**/src/**/*.{test,spec}.ts',
    ],
    environment: 'node',
    globals: false,
    // nock patches the shared http module; keep files isolated
    isolate: true,
  },
  resolve: {
    alias: {
      '@protrace/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@protrace/carriers': fileURLToPath(new URL('./packages/carriers/src/index.ts', import.meta.url)),
    },
  },
});
