import { defineConfig } from 'vitest/config';
import { resolve } from 'path';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    globals: true,
    include: [
      'core/**/*.test.ts',
      'parser/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'services/**/*.test.ts',
      'cli/**/*.test.ts',
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    alias: {
      '@core': resolve(__dirname, './core'),
      '@parser': resolve(__dirname, './parser'),
      '@interpreter': resolve(__dirname, './interpreter'),
      '@services': resolve(__dirname, './services'),
      '@cli': resolve(__dirname, './cli'),
      '@tests': resolve(__dirname, './tests')
    }
  }
});
