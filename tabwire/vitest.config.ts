import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 15000,
    hookTimeout: 15000,
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['dist', 'dist/**/*', 'node_modules/**'],

    // Integration tests each start a loopback fake DevTools endpoint
    fileParallelism: false,
  },
})
