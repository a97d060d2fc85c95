import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // One project per package; each runs its *.test.ts files beside the sources.
    projects: ['packages/field', 'packages/testing'],
  },
})
