import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  sourcemap: true,
  clean: true,
  dts: false,
  treeshake: true,
  target: 'es2022',
  // workspace packages ship TypeScript sources; bundle them into the binary
  noExternal: [/^@archgate\//],
  external: ['commander', 'colorette', 'dotenv', 'openai', 'p-limit', 'picomatch', 'yaml', 'zod'],
  banner: {
    js: '#!/usr/bin/env node'
  }
})
