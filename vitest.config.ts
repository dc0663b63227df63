import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    coverage: {
      include: ['cli/**/*.ts', 'core/**/*.ts'],
      exclude: ['core/index.ts'],
      provider: 'v8',
    },
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
