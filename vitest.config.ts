import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    // Resolve @dbconverge/* to TypeScript source instead of dist/
    alias: [
      { find: '@dbconverge/core/domain', replacement: source('./packages/core/domain/index.ts') },
      { find: '@dbconverge/core/ports', replacement: source('./packages/core/ports/index.ts') },
      { find: '@dbconverge/reconciler', replacement: source('./packages/reconciler/src/index.ts') },
      { find: '@dbconverge/adapters/mssql', replacement: source('./packages/adapters/mssql/index.ts') },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
});
