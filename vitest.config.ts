import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['src/test/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov', 'json'],
      reportsDirectory: 'coverage',
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
        perFile: true
      },
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/tools/**',
        'src/test/**',
        'src/contracts/**',
        'dist/**',
        'vitest.config.*',
      ]
    },
    include: ['__tests__/**/*.test.ts'],
  }
});
