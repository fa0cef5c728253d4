import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'node',
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fixtures/vitest.setup.ts'],
    hookTimeout: 120_000,
    testTimeout: 60_000,
  },
});
