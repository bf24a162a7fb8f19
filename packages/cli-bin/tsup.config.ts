import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    bin: 'src/bin.ts',
  },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  outDir: 'dist',
  clean: true,
  sourcemap: false,
  // Workspace packages point at TypeScript sources, so they are bundled in
  noExternal: [/^@qprof\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
