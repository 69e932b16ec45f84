import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

const workspacePackages = ['errors', 'logging', 'configuration', 'resilience', 'health'];

export default defineConfig({
  resolve: {
    // Workspace packages export their build output; tests run against the sources
    alias: workspacePackages.map(name => ({
      find: `@telemetry-guard/${name}`,
      replacement: fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
    })),
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    exclude: ['node_modules/', 'dist/', '**/dist/**'],
  },
});
