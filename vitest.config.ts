import { defineConfig } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@hudkit/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@hudkit/engine': resolve(__dirname, 'packages/engine/src/index.ts'),
      '@hudkit/cli': resolve(__dirname, 'packages/cli/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
})
