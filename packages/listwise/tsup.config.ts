import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (every function + Listwise namespace)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    errors: 'src/errors-entry.ts',
    result: 'src/result.ts',
    memo: 'src/memo-entry.ts',
    pair: 'src/pair.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
