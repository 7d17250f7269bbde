/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * HOW: Discovers tests under every workspace's tests/ directory.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    environment: 'node',
  },
});
