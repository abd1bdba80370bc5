import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    globals: true,
    coverage: { all: true, thresholds: { lines: 90 } },
    environment: 'node',
    include: ['packages/**/__tests__/**/*.spec.ts'],
  }
});
