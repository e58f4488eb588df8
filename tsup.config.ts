import { defineConfig } from 'tsup';

export default defineConfig([
  // CLI bundle
  {
    entry: {
      'cli/index': 'src/cli/index.ts',
    },
    format: ['cjs'],
    dts: false,
    sourcemap: true,
    clean: false,
    platform: 'node',
    target: 'node20',
  },
  // Main entry
  {
    entry: {
      index: 'src/index.ts',
    },
    format: ['cjs', 'esm'],
    dts: true,
    sourcemap: true,
    clean: false,
    platform: 'node',
  },
]);
