import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/lib.ts'],
  format: ['esm'],
  dts: { entry: 'src/lib.ts' },
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  external: [
    // Runtime dependencies are installed alongside the CLI
    '@google/generative-ai',
    'chalk',
    'commander',
    'node-fetch',
    'zod'
  ]
});
