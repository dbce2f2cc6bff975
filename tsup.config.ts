import { defineConfig } from 'tsup';
// Node.js built-ins and runtime dependencies stay outside the bundle
const externalDependencies = [
  'winston',
  'async_hooks',
  'fs',
  'os',
  'path',
  'util',
  'vm',
  'worker_threads'
];

export default defineConfig({
  entry: {
    index: 'sdk/index.ts'
  },
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  outDir: 'dist',
  outExtension() {
    return {
      js: '.mjs'
    };
  },
  external: externalDependencies,
  noExternal: ['@core/*', '@interpreter/*', '@sdk/*'],
  esbuildOptions(options) {
    options.alias = {
      '@core': './core',
      '@interpreter': './interpreter',
      '@sdk': './sdk'
    };
    options.platform = 'node';
    options.target = 'node20';
  }
});
