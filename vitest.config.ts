/**
 * FILE PURPOSE: Root Vitest config for the workspace
 *
 * HOW: Discovers tests in every package's tests/ directory. Packages keep
 *      their own config for running in isolation.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/*/src/index.ts'],
    },
  },
});
