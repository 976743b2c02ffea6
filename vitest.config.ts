import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export const workspaceAlias = [
  {
    find: /^@spurn\/(shared|schemas|core|api)\/(.*)\.js$/,
    replacement: fileURLToPath(new URL('./packages/$1/$2.ts', import.meta.url)),
  },
];

export default defineConfig({
  resolve: { alias: workspaceAlias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['packages/*/src/**/*.integration.test.ts', 'node_modules'],
  },
});
