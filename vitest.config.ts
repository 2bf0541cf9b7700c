import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@specloom/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
})
