import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string): string => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@forecastr/core': source('core'),
      '@forecastr/tools': source('tools'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
