import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@lastmod/core': workspace('./packages/core/src/index.ts'),
      '@lastmod/codec-xml': workspace('./packages/codec/xml/src/index.ts'),
      '@lastmod/crawler-link': workspace('./packages/crawler/link/src/index.ts'),
      '@lastmod/source-http': workspace('./packages/source/http/src/index.ts'),
      '@lastmod/source-file': workspace('./packages/source/file/src/index.ts'),
      '@lastmod/cli': workspace('./packages/cli/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['**/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
