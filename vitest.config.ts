import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@rekening/types': fromRoot('./packages/types/src/index.ts'),
      '@rekening/description': fromRoot('./packages/description/src/index.ts'),
      '@rekening/tsv-parser': fromRoot('./packages/tsv-parser/src/index.ts'),
      '@rekening/ics-parser': fromRoot('./packages/ics-parser/src/index.ts'),
      '@rekening/pdf-extract': fromRoot('./packages/pdf-extract/src/index.ts'),
      '@rekening/output': fromRoot('./packages/output/src/index.ts'),
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
