import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Runtime libraries stay external so consumers share one copy
const externalDependencies = [
  'winston',
  'js-yaml',
  'lodash',
  'lodash/isEqual.js',

  // Node.js built-ins
  'fs',
  'path',
  'os',
  'util'
];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const getEsbuildOptions = (options: EsbuildOptions): void => {
  options.alias = {
    '@core': './core',
    '@tools': './tools',
    '@api': './api'
  };
  options.platform = 'node';
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'es2022';
};

export default defineConfig([
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    treeshake: true,
    outDir: 'dist',
    outExtension() {
      return {
        js: '.mjs'
      };
    },
    external: externalDependencies,
    esbuildOptions(options) {
      getEsbuildOptions(options);
    }
  },
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: false,
    sourcemap: true,
    treeshake: true,
    outDir: 'dist',
    outExtension() {
      return {
        js: '.cjs'
      };
    },
    external: externalDependencies,
    esbuildOptions(options) {
      getEsbuildOptions(options);
    }
  }
]);
