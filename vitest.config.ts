import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      SWEEPWISE_LOG_LEVEL: 'ERROR'
    },
    testTimeout: 20000
  }
})
