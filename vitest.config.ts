/**
 * Vitest Configuration for karapace-lifecycle
 *
 * Unit tests only; every test runs against in-process stand-ins.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Reconciliation tests use zero-delay retry policies; keep the default short
    testTimeout: 10000,

    // Environment
    environment: 'node',

    // Type checking
    typecheck: {
      enabled: false, // Disable for faster tests; use tsc --noEmit separately
    },
  },
});
