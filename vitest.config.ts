import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent'
    },
    testTimeout: 10000,
    reporters: ['default']
  }
});
