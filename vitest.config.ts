import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts', 'services/*/test/**/*.test.ts'],
    testTimeout: 30_000, // end-to-end pipeline tests write and zip real directories
    coverage: {
      reporter: ['text', 'json', 'html'],
    },
  },
})
