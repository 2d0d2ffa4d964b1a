import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup/timezone.ts', 'tests/setup/loggerMock.ts'],
    clearMocks: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['packages/main/src/**/*.ts', 'packages/shared/src/**/*.ts'],
      exclude: ['tests/**', 'packages/**/dist/**', 'packages/main/src/cli/**'],
      thresholds: {
        statements: 60,
        lines: 60,
        functions: 60,
        branches: 50
      }
    }
  }
});
