import { defineConfig } from 'tsup';

// Runtime dependencies stay external; internal @core/@services/... aliases
// are resolved from tsconfig paths and bundled.
const externalDependencies = [
  'chalk',
  'commander',
  'entities',
  'fs-extra',
  'winston'
];

export default defineConfig([
  // API build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['esm'],
    dts: false,
    clean: true,
    sourcemap: true,
    platform: 'node',
    target: 'node20',
    outDir: 'dist',
    outExtension() {
      return { js: '.mjs' };
    },
    external: externalDependencies
  },
  // CLI build
  {
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: ['esm'],
    dts: false,
    clean: false,
    sourcemap: true,
    platform: 'node',
    target: 'node20',
    outDir: 'dist',
    outExtension() {
      return { js: '.mjs' };
    },
    external: externalDependencies,
    banner: {
      js: '#!/usr/bin/env node'
    }
  }
]);
