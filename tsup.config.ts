import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    csrf: 'src/middleware/csrf/index.ts',
    audit: 'src/middleware/audit/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  treeshake: true,
  minify: false,
  external: ['next', 'zod'],
  esbuildOptions(options) {
    options.platform = 'node'
  },
})
