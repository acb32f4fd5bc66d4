import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspaces = {
  '@hiresdl/utils': 'packages/utils',
  '@hiresdl/core': 'packages/core',
  '@hiresdl/api': 'packages/api',
  '@hiresdl/acquisition': 'packages/acquisition',
  '@hiresdl/processing': 'packages/processing',
};

export default defineConfig({
  resolve: {
    alias: Object.entries(workspaces).map(([find, dir]) => ({
      find,
      replacement: fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url)),
    })),
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
  },
});
