import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  sourcemap: true,
  clean: true,
  dts: false,
  treeshake: true,
  target: 'es2022',
  external: [
    '@brevity/core',
    '@brevity/provider-types',
    '@brevity/provider-mock',
    '@brevity/provider-openai',
    '@brevity/provider-claude',
    '@brevity/provider-gemini',
    'commander',
    'colorette',
    'dotenv',
    'yaml',
    'zod'
  ],
  banner: {
    js: '#!/usr/bin/env node'
  }
})
