import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry — consumers import the core from here
  {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    platform: 'node',
    target: 'node20',
  },
  // Executables — shebang is kept by tsup
  {
    entry: { 'cli/bin': 'src/cli/bin.ts', 'mcp/bin': 'src/mcp/bin.ts' },
    format: ['esm'],
    dts: false,
    sourcemap: true,
    platform: 'node',
    target: 'node20',
  },
]);
