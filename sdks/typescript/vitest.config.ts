import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const src = fileURLToPath(new URL('./src/', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@jdb\/client\/(.*)$/,
        replacement: `${src}$1.ts`,
      },
      {
        find: '@jdb/client',
        replacement: `${src}index.ts`,
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['dist/**', 'tests/**', 'examples/**'],
    },
  },
});
