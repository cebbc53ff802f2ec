import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['sdks/**/src/**/*.test.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
  },
});
