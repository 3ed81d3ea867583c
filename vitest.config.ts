import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['web-search/src/**/*.test.ts'],
    environment: 'node',
  },
});
