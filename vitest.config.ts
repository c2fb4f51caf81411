import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Keep component loggers quiet unless a test opts in
    env: {
      LOG_LEVEL: 'fatal',
      LOG_FORMAT: 'json',
    },
    testTimeout: 10000,
  },
})
