import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  // Relative imports are extensionless, so the output has to be bundled
  bundle: true,
  external: [
    '@google/generative-ai',
    'chalk',
    'commander',
    'strip-ansi',
    'zod'
  ]
});
