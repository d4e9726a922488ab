/**
 * Vitest Configuration
 *
 * Unit and integration tests with coverage
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    globals: true,
    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        'tests/',
        '**/*.test.ts',
        'src/cli.ts', // Entry point with minimal logic
        'src/messenger/telegram-messenger.ts' // Network client
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80
      },
      clean: true
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    // Tests share temp directories and process.env
    sequence: {
      concurrent: false
    }
  }
});
