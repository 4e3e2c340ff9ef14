import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const coreSrc = fileURLToPath(new URL('./packages/core/src/', import.meta.url))

export default defineConfig({
  resolve: {
    // Workspace imports resolve to TypeScript sources, no build needed
    alias: [
      {
        find: /^@dashboard-sync\/core\/(.*)$/,
        replacement: `${coreSrc}$1/index.ts`,
      },
    ],
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/test-utils/**'],
    },
  },
})
