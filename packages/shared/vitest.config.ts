import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const workspace = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    name: 'shared',
    include: ['src/**/*.test.ts'],
    environment: 'node',
    globals: true,
  },
  resolve: {
    alias: {
      '@meshack/shared': workspace('../shared/src/index.ts'),
      '@meshack/core': workspace('../core/src/index.ts'),
      '@meshack/mesh-protocol': workspace('../mesh-protocol/src/index.ts'),
      '@meshack/node': workspace('../node/src/index.ts'),
    },
  },
});
