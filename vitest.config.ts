import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@cisbench/types': fromRoot('./packages/types/src/index.ts'),
      '@cisbench/pdf-extract': fromRoot('./packages/pdf-extract/src/index.ts'),
      '@cisbench/cis-parser': fromRoot('./packages/cis-parser/src/index.ts'),
      '@cisbench/output': fromRoot('./packages/output/src/index.ts'),
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
