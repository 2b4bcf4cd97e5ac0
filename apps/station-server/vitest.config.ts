import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const workspace = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    name: 'station-server',
    include: ['src/**/*.test.ts'],
    environment: 'node',
    globals: true,
  },
  resolve: {
    alias: {
      '@meshack/shared': workspace('../../packages/shared/src/index.ts'),
      '@meshack/core': workspace('../../packages/core/src/index.ts'),
      '@meshack/mesh-protocol': workspace(
        '../../packages/mesh-protocol/src/index.ts'
      ),
      '@meshack/node': workspace('../../packages/node/src/index.ts'),
    },
  },
});
