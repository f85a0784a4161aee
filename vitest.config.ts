import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/src/**/*.test.ts'],
    exclude: [...configDefaults.exclude],
    testTimeout: 10_000,
  },
});
