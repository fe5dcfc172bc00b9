import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['backend/services/collector/src/**/*.test.ts'],
    environment: 'node',
  },
})
