import { defineConfig } from 'tsdown'

export default defineConfig([
  // Library bundle: dist/index.js + dist/index.d.ts
  // Workspace packages are private, so they are bundled inline
  {
    entry: { index: './packages/gml/src/index.ts' },
    format: 'esm',
    platform: 'node',
    dts: true,
    clean: true,
    outDir: 'dist',
    noExternal: [/^@gmlkit\//],
  },
  // CLI binary: dist/cli.js
  {
    entry: { cli: './packages/cli/src/cli.ts' },
    format: 'esm',
    platform: 'node',
    dts: false,
    outDir: 'dist',
    noExternal: [/^@gmlkit\//],
  },
])
