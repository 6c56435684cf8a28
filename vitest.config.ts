import path from 'path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Environment
    environment: 'node',
    globals: true,

    // Test file patterns
    include: ['tests/**/*.test.ts', 'src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '.next', 'coverage'],

    // Setup files
    setupFiles: ['./vitest.setup.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'text-summary', 'lcov'],
      exclude: ['node_modules/**', 'tests/**', '**/*.test.ts', '**/types.ts', '*.config.*'],
      thresholds: {
        // Settlement paths move money; keep them well covered
        'src/domains/charge/**': {
          statements: 85,
          branches: 80,
          functions: 85,
          lines: 85,
        },
      },
    },

    // Timeouts
    testTimeout: 30000,
    hookTimeout: 30000,

    // better-sqlite3 handles are per-process; forks keep them isolated
    pool: 'forks',

    // Mock configuration
    restoreMocks: true,
    clearMocks: true,
  },
  resolve: {
    alias: {
      '@/tests': path.resolve(__dirname, './tests'),
      '@': path.resolve(__dirname, './src'),
    },
  },
});
