import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['**/types/**', '**/*types.ts', 'src/cli/index.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
