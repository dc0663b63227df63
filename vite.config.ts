import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import path from 'node:path'

/**
 * Check if a module is external.
 *
 * @param id - The module ID.
 * @returns True for bare package and `node:` imports.
 */
function external(id: string): boolean {
  return !id.startsWith('.') && !path.isAbsolute(id)
}

/** Vite configuration. */
export default defineConfig({
  build: {
    lib: {
      entry: {
        'bin/semver-tagger': path.resolve(
          import.meta.dirname,
          'bin/semver-tagger.ts',
        ),
        'core/index': path.resolve(import.meta.dirname, 'core/index.ts'),
      },
      formats: ['es'],
    },
    rollupOptions: {
      output: {
        chunkFileNames: 'chunks/[name]-[hash].js',
        entryFileNames: '[name].js',
        exports: 'auto',
      },
      external,
    },
    target: 'node20',
    minify: false,
  },
  plugins: [
    dts({
      include: [
        path.resolve(import.meta.dirname, 'cli'),
        path.resolve(import.meta.dirname, 'core'),
        path.resolve(import.meta.dirname, 'types'),
      ],
      copyDtsFiles: true,
      strictOutput: true,
    }),
  ],
})
