import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const workspace = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    name: 'core',
    include: [
      'tests/unit/**/*.test.ts',
      'tests/integration/**/*.integration.test.ts',
    ],
    environment: 'node',
    globals: true,
    setupFiles: ['tests/shared/setup-all.ts'],
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@meshack/shared': workspace('../shared/src/index.ts'),
      '@meshack/core': workspace('./src/index.ts'),
    },
  },
});
