import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@medisync/types': fromRoot('./packages/types/src/index.ts'),
      '@medisync/core': fromRoot('./packages/core/src/index.ts'),
      '@medisync/domain': fromRoot('./packages/domain/src/index.ts'),
      '@medisync/integrations': fromRoot('./packages/integrations/src/index.ts'),
      '@medisync/application': fromRoot('./packages/application/src/index.ts'),
      '@medisync/infrastructure': fromRoot('./packages/infrastructure/src/index.ts'),
    },
  },
});
