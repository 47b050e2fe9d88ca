import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['src/test/setup.ts'],
    coverage: {
      enabled: false,
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: 'coverage',
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
      exclude: [
        'src/index.ts',
        'src/tools/**',
        'src/test/**',
        'dist/**',
        'vitest.config.*',
        '__tests__/helpers/**',
        '__tests__/unit/helpers/**',
      ]
    },
    include: ['__tests__/**/*.test.ts'],
  }
});
