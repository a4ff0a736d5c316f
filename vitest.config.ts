import path from 'node:path';
import { defineConfig, type UserConfig } from 'vitest/config';

// workspace packages resolve to their compiled dist/ at run time; tests read the sources
const workspaceSource = (name: string) => path.resolve(__dirname, 'packages', name, 'src/index.ts');

export const globalConfig: UserConfig = {
  resolve: {
    alias: {
      '@hub-sync/logger': workspaceSource('logger'),
      '@hub-sync/utils': workspaceSource('utils'),
    },
  },
  test: {
    environment: 'node',
    testTimeout: 10_000,
  },
};

export default defineConfig({
  test: {
    projects: ['packages/*', 'services/*'],
  },
});
