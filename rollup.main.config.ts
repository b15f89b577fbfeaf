// See: https://rollupjs.org/introduction/

import commonjs from '@rollup/plugin-commonjs'
import json from '@rollup/plugin-json'
import nodeResolve from '@rollup/plugin-node-resolve'
import typescript from '@rollup/plugin-typescript'
import type {RollupOptions} from 'rollup'

// Actions run without node_modules, so the entry point is bundled with its
// dependencies into a single CommonJS file.
const config: RollupOptions = {
  input: 'src/main.ts',
  output: {
    file: 'dist/index.js',
    format: 'cjs',
    sourcemap: false
  },
  plugins: [
    typescript({
      tsconfig: './tsconfig.build.json',
      compilerOptions: {module: 'ESNext', outDir: 'dist'}
    }),
    nodeResolve({preferBuiltins: true}),
    commonjs(),
    json()
  ]
}

export default config
