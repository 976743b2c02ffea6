import { defineConfig } from 'vitest/config';
import { workspaceAlias } from './vitest.config.js';

export default defineConfig({
  resolve: { alias: workspaceAlias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.integration.test.ts'],
    testTimeout: 30000,
  },
});
