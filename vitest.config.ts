import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.spec.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      reporter: ['text', 'html'],
    },
  },
});
