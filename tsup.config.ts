import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'src/index.ts' },
  format: ['esm'],
  platform: 'node',
  dts: {
    compilerOptions: {
      removeComments: true
    }
  },
  clean: true,
  splitting: false,
  treeshake: true,
  sourcemap: false,
  target: 'node20'
});
