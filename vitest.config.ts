/// <reference types="vite/client" />
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [
    tsconfigPaths(),
  ],
  test: {
    include: ['jslib/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['jslib/**/*.ts'],
      exclude: ['jslib/**/*.test.ts', 'jslib/**/*.arbitrary.ts'],
    },
    alias: [
      { find: /^#(.*)$/, replacement: fileURLToPath(new URL('./jslib/', import.meta.url)) + '$1' },
    ],
  },
});
