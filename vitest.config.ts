import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const workspace = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tacticforge/pgn': workspace('pgn'),
      '@tacticforge/engine': workspace('engine'),
      '@tacticforge/core': workspace('core'),
      '@tacticforge/test-utils': workspace('test-utils'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
