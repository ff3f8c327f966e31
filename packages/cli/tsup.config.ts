import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  outDir: 'dist',
  clean: true,
  noExternal: ['@testpattern/core', '@testpattern/types'],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
