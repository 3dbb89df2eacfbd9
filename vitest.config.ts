import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Include patterns
    include: ['src/test/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist', 'temp'],

    testTimeout: 30000,

    env: {
      NODE_ENV: 'test',
    },
  },
});
