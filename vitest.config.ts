import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['sdk/tests/**/*.test.ts', 'agents/*/tests/**/*.test.ts'],
    testTimeout: 10_000,
  },
})
