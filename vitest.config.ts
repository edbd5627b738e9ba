import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: ['packages/**/tests/unit/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/**/src/bin/**', 'packages/**/dist/**'],
      thresholds: {
        lines: 60,
        functions: 60,
        branches: 60,
        statements: 60,
      },
    },
  },
  resolve: {
    alias: {
      '@adprep/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@adprep/workflows': resolveFromRoot('packages/workflows/src/index.ts'),
      '@adprep/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
