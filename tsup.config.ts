import { defineConfig } from 'tsup';
import type { Options } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, 'package.json'), 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  throw new Error('package.json has no version');
}

const packageVersion = readVersion();

// Runtime dependencies stay external; everything under the aliases is bundled
const externalDependencies = [
  'chalk',
  'string-width',
  'winston',

  // Node.js built-ins
  'fs',
  'fs/promises',
  'path',
  'os',
  'child_process'
];

const internalAliases = ['@core/*', '@parser/*', '@interpreter/*', '@services/*', '@cli/*'];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const esbuildOptions = (options: EsbuildOptions) => {
  options.alias = {
    '@core': './core',
    '@parser': './parser',
    '@interpreter': './interpreter',
    '@services': './services',
    '@cli': './cli'
  };

  options.define = {
    ...(options.define || {}),
    '__VERSION__': JSON.stringify(packageVersion)
  };

  options.platform = 'node';
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'node20';
};

export default defineConfig([
  // Library entry
  {
    entry: {
      index: 'index.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: false,
    treeshake: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    noExternal: internalAliases,
    esbuildOptions
  },
  // CLI entry
  {
    entry: {
      mdtask: 'bin/mdtask.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: false,
    sourcemap: true,
    treeshake: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    noExternal: internalAliases,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions
  }
]);
