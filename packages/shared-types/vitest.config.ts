/**
 * Workspace-level Vitest config for @recipe-qa/shared-types
 *
 * WHY: Pure types package. The only tests check that the shapes compose.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: true,
  },
});
