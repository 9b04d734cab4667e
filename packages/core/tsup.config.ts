import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',   // @k7/core - interfaces, codec, reconciler, transfer
    'src/fs.ts',      // @k7/core/fs - filesystem implementations
    'src/memory.ts',  // @k7/core/memory - in-memory implementations
  ],
  format: ['cjs'],
  dts: false,
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  treeshake: true,
  external: ['ajv', 'ajv-formats'],
});
