import { defineConfig } from 'tsup';
import type { Options } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';

const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, 'package.json'), 'utf-8'));
const packageVersion =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

// Runtime dependencies stay external in every bundle
const externalDependencies = [
  'chalk',
  'commander',
  'liquidjs',
  'winston'
];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const getEsbuildOptions = (format: 'esm' | 'cjs') => (options: EsbuildOptions) => {
  options.alias = {
    '@core': './core',
    '@services': './services',
    '@api': './api',
    '@cli': './cli'
  };

  options.define = {
    ...(options.define || {}),
    '__VERSION__': JSON.stringify(packageVersion)
  };

  options.platform = 'node';

  if (format === 'esm') {
    options.mainFields = ['module', 'main'];
    options.conditions = ['import', 'module', 'require', 'default'];
  }

  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'node20';

  return options;
};

const internalModules = ['@core/*', '@services/*', '@api/*', '@cli/*'];

export default defineConfig([
  // Library build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['esm', 'cjs'],
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: false,
    outDir: 'dist',
    outExtension({ format }) {
      return {
        js: format === 'esm' ? '.mjs' : '.cjs'
      };
    },
    external: externalDependencies,
    noExternal: internalModules,
    esbuildOptions(options, { format }) {
      return getEsbuildOptions(format === 'esm' ? 'esm' : 'cjs')(options);
    }
  },
  // CLI build
  {
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: 'cjs',
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    outExtension() {
      return {
        js: '.cjs'
      };
    },
    external: externalDependencies,
    noExternal: internalModules,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions(options) {
      return getEsbuildOptions('cjs')(options);
    }
  }
]);
