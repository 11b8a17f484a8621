import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    verbump: 'bin/verbump.ts',
    index: 'src/index.ts',
  },
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: true,
  dts: true,
});
