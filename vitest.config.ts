import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const resolveLocal = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@/tests': resolveLocal('./tests'),
      '@': resolveLocal('./src'),
    },
  },
});
