import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    reporters: ['default'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
    clearMocks: true,
    restoreMocks: true,
  },
});
