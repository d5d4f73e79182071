import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'cli/index': 'src/cli/index.ts',
  },
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  // Shebang for the `localnet` bin entry
  banner: {
    js: '#!/usr/bin/env node',
  },
});
