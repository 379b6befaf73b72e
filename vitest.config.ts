import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.{ts,tsx}'],
    unstubGlobals: true,
    coverage: {
      exclude: ['**/types/**', '**/*types.ts', '**/fixtures/**', ...coverageConfigDefaults.exclude],
    },
  },
});
