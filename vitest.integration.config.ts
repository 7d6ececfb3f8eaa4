import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'], // Needs DATABASE_URL; skipped otherwise
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true }, // Tests share one database, run them sequentially
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
