import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@marker-engine/core': pkg('core'),
      '@marker-engine/registry': pkg('registry'),
      '@marker-engine/pipeline': pkg('pipeline'),
      '@marker-engine/integration': pkg('integration'),
    },
  },
});
