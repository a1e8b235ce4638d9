import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
    testTimeout: 15000,
    restoreMocks: true,
  },
});
