import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['server/src/**/*.test.ts', 'web/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    setupFiles: ['web/src/__tests__/setup.ts'],
    restoreMocks: true,
  },
})
