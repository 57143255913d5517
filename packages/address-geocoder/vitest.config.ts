/**
 * Vitest Configuration for Unit Tests
 *
 * All provider traffic is scripted or goes through a stubbed fetch.
 *
 * USAGE: npm test
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'address-geocoder',

    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    // Isolate each test file
    isolate: true,

    testTimeout: 5_000,
    hookTimeout: 5_000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/__tests__/**'],
    },

    globals: true,
    environment: 'node',

    // Unit tests must be deterministic
    retry: 0,
  },
});
