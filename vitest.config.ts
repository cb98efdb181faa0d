import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (dir: string) => fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@api': fromRoot('api'),
      '@config': fromRoot('config'),
      '@core': fromRoot('core'),
      '@infra': fromRoot('infrastructure'),
      '@middleware': fromRoot('middleware'),
      '@services': fromRoot('services'),
      '@test': fromRoot('test'),
      '@utils': fromRoot('utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test/setupEnv.ts'],
  },
});
