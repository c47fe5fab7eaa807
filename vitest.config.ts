import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['**/types.ts', '**/index.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
