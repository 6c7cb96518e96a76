import { fileURLToPath } from 'url'
import { defineConfig } from 'vitest/config'

const resolvePath = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    alias: {
      '@shared': resolvePath('./src/shared'),
      '@': resolvePath('./src'),
    },
  },
})
