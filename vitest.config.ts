import { URL, fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@chatcast/core': packageEntry('core'),
      '@chatcast/livechat': packageEntry('livechat'),
      '@chatcast/server': packageEntry('server'),
      '@chatcast/cli': packageEntry('cli'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['packages/core/src/__tests__/setup.ts'],
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    pool: 'forks',
    minWorkers: 1,
    maxWorkers: 4,
  },
});
