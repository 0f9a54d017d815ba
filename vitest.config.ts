import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/cli/rulegate.ts',
        'src/domain/rule/types.ts',
        'src/domain/event/types.ts',
        'src/domain/hook/types.ts',
        'src/domain/lint/types.ts',
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,
      },
      reporter: ['text', 'json', 'html'],
    },
    testTimeout: 10000,
  },
});
