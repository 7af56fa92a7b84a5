import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    setupFiles: ['./test-setup.ts'],
    environment: 'node',
    // Daemon tests signal their own process; keep each file in its own child process
    pool: 'forks',
  },
})
