import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Workspace packages resolve to their TypeScript sources, not dist/
  resolve: {
    conditions: ['source'],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts', '__tests__/**/*.test.ts'],
    exclude: ['node_modules/**'],
    // Integration tests start a loopback HTTP server per test
    testTimeout: 10000,
    hookTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        '**/*.test.ts',
        '**/testUtils.ts',
        '**/dist/',
        '**/*.config.ts',
        '__tests__/**',
      ],
    },
  },
});
