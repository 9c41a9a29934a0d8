import { defineConfig } from 'vitest/config'
import path from 'path'
import { fileURLToPath } from 'url'

const rootDir: string = path.dirname(fileURLToPath(import.meta.url))

/**
 * Vitest configuration. Tests live beside their sources as *.test.ts.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(rootDir, './src'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    silent: true,
    pool: 'forks',
    testTimeout: 10000,
    hookTimeout: 5000,
  },
})
