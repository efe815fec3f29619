import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'viewer',
    globals: true,
    environment: 'node',
  },
  resolve: {
    alias: {
      '@brickmesh/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
