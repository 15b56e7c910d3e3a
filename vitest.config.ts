import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: [
      'packages/**/src/**/*.spec.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    testTimeout: 20000,

    coverage: {
      provider: 'v8',
      all: true,
      include: ['packages/**/src/**/*.ts'],
      reportsDirectory: './coverage',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        statements: 70,
        lines: 70,
        branches: 70,
        functions: 75,
      },
      exclude: [
        '**/dist/**',
        '**/__tests__/**',
        '**/*.spec.*',
        'packages/cli/src/index.ts',
      ],
    },
  },
})
