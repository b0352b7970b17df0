import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/cli.ts'], // CLI entry point parses argv on import
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
