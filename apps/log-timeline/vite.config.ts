import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

const externals = Array.from(new Set([...builtins, 'js-yaml', 'picocolors']))

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: 'src/log-timeline.ts',
      formats: ['es'],
      fileName: 'log-timeline',
    },
    sourcemap: true,
    rollupOptions: {
      external: externals,
      output: {
        banner: '#!/usr/bin/env node',
      },
    },
  },
})
