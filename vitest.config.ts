import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['review-service/src/**/*.test.ts'],
    environment: 'node',
  },
});
