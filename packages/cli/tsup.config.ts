import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  dts: false,
  clean: true,
  sourcemap: true,
  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: [/^@digestor\//],
  external: ['discord.js', 'openai', 'commander', 'chalk', 'ora'],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
