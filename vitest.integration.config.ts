import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Needs DATABASE_URL with migrations applied; suites skip themselves otherwise
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    maxWorkers: 1,
    maxConcurrency: 1,
  },
});
