import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.spec.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['src/**/__tests__/fixtures.ts'],
    environment: 'node',
    restoreMocks: true,
  },
})
