import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts', './e2e/**/*.test.ts'],
    coverage: {
      exclude: ['**/types/**', '**/index.ts', 'e2e/**', ...coverageConfigDefaults.exclude],
    },
  },
});
