import { defineConfig } from 'vitest/config';
const coverageEnabled = process.env.COVERAGE === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    include: [ 'tests/**/*.test.ts' ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    globals: true,
    coverage: {
      enabled: coverageEnabled,
      provider: 'v8',
      reportsDirectory: 'coverage',
      include: [
        'src/environment/**/*.ts',
        'src/orchestrator/**/*.ts',
        'src/supervisor/**/*.ts',
        'src/config/**/*.ts',
      ],
      reporter: [ 'text', 'text-summary', 'lcov' ],
    },
  },
});
