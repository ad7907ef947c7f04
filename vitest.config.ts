import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['bingo-backend/tests/**/*.test.ts'],
    environment: 'node',
    // sqlite3 is a native addon; keep each test file in its own process
    pool: 'forks',
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      FREE_GENERATION_LIMIT: '5',
    },
  },
})
