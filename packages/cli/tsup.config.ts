import { defineConfig } from 'tsup';

// Workspace packages export their TypeScript sources, so they are bundled in.
export default defineConfig({
  entry: ['bin/tally.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  clean: true,
  sourcemap: true,
  noExternal: [/^@tally\//],
  external: ['better-sqlite3', 'hono', '@hono/node-server', 'commander', 'yaml', 'zod'],
});
