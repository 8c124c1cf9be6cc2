import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bankrecon/types': fromRoot('./packages/types/src/index.ts'),
      '@bankrecon/output': fromRoot('./packages/output/src/index.ts'),
      '@bankrecon/engine': fromRoot('./packages/engine/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
