import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/engine.ts'],
  format: ['esm'],
  dts: { entry: 'src/engine.ts' },
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: true,
  external: [
    // All dependencies stay external for the CLI
    'chalk',
    'commander',
    'fuzzball',
    'strip-ansi',
    'yaml',
    'zod'
  ]
});
