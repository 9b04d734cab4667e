import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs'],
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  // @k7/core ships TypeScript sources inside the workspace; bundle it into the binary
  noExternal: [/^@k7\/core/],
  external: ['ajv', 'ajv-formats', 'commander'],
});
