import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function pkg(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@geosync/core': pkg('core'),
      '@geosync/connector-api': pkg('connector-api'),
      '@geosync/connector-db': pkg('connector-db'),
      '@geosync/pipeline-core': pkg('pipeline-core'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
