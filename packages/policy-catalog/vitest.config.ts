import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'policy-catalog',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    pool: 'forks',
    environment: 'node',
  },
});
