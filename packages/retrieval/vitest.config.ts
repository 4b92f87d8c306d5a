/**
 * Workspace-level Vitest config for @recipe-qa/retrieval
 *
 * WHY: The root config's include patterns are relative and don't resolve
 *      when `vitest run` is started from this directory.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
