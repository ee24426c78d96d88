/**
 * Vitest Configuration
 *
 * Unit testing configuration for the Nuclos REST client.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['tests/**/*.test.ts', 'src/**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.spec.ts', 'src/types/**', 'src/**/*.d.ts'],
    },

    globals: true,
    clearMocks: true,

    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
