import path from 'path';
import { defineConfig } from 'vitest/config';

const workspacePackages = ['shared', 'index-client', 'core'];

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their TypeScript sources; `main` points at build output.
    alias: Object.fromEntries(
      workspacePackages.map((pkg) => [
        `@typecensus/${pkg}`,
        path.resolve(__dirname, 'packages', pkg, 'src', 'index.ts'),
      ]),
    ),
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/__fixtures__/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.test.ts',
        '**/test/**',
        '**/__fixtures__/**',
      ],
    },
  },
});
