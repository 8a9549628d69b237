import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/{src,lib,test}/**/*.test.ts'],
    environment: 'node',
  },
})
