import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**', '**/dist/**'],
    globals: true,
  },
});
