import { defineConfig } from 'tsup';

export default defineConfig([
  // Runtime: directives, method logger, log sink
  {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    dts: true,
    clean: true,
    outDir: 'dist',
  },
  // Build-time generator subpath export
  {
    entry: { 'generator/index': 'src/generator/index.ts' },
    format: ['esm'],
    dts: true,
    outDir: 'dist',
    external: ['typescript'],
  },
]);
