import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry: tree-shakeable ESM with .d.ts
  {
    entry: {
      index: 'src/index.ts',
      themes: 'src/themes/index.ts',
    },
    format: ['esm'],
    dts: true,
    sourcemap: true,
    clean: true,
    external: ['@xterm/xterm'],
  },
  // CLI entry: `minefield` binary
  {
    entry: { cli: 'src/cli.ts' },
    format: ['esm'],
    target: 'node20',
    platform: 'node',
    sourcemap: true,
    banner: { js: '#!/usr/bin/env node' },
    external: ['@xterm/xterm'],
  },
]);
