import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    cli: 'src/cli.ts',
    'vite/index': 'src/dev/vite-plugin.ts',
  },

  outDir: 'dist',

  format: ['esm'],
  platform: 'node',
  target: 'node20',

  dts: true,
  sourcemap: true,
  clean: true,

  treeshake: true,
  splitting: false,
});
