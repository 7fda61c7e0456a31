import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/** Workspace packages load from source so tests need no build */
function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@nowcast/core': source('core'),
      '@nowcast/forecasting': source('forecasting'),
    },
  },
  test: {
    environment: 'node',

    // Include patterns
    include: ['packages/*/src/**/__tests__/**/*.test.ts', 'apps/*/src/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    pool: 'threads',
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/*.test.ts', 'apps/cli/src/index.ts'],
    },

    reporters: ['default'],

    watch: false,

    restoreMocks: true,
    clearMocks: true,
  },
});
