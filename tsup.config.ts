import { defineConfig } from 'tsup'

/**
 * Library bundle: one entry, ESM + CJS with declarations
 */
export default defineConfig({
    name: 'arbkit',

    entry: {
        index: 'index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2022',

    platform: 'neutral',
})
