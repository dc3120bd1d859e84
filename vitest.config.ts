import { defineConfig } from 'vitest/config'

/**
 * Tests run under Node.js against temporary directories; nothing leaves the
 * process.
 *
 * Run with: npm test
 */
export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
})
