import { defineConfig } from 'vitest/config'

/** Vitest configuration. */
export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    env: { NO_COLOR: '1' },
    environment: 'node',
  },
})
