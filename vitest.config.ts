import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * schemafold Vitest configuration
 *
 * - Fixed pool per platform
 * - No retries
 * - Extended timeouts for property-based testing
 * - Workspace packages load from their sources, no build needed
 */

const getPoolConfig = (): { pool: 'threads' | 'forks' } => ({
  pool: process.platform === 'win32' ? 'threads' : 'forks',
});

const isCI = process.env.CI === 'true';

export default defineConfig({
  resolve: {
    alias: {
      '@schemafold/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    ...getPoolConfig(),

    include: ['packages/**/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
