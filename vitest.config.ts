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
      'api/**/*.test.ts',
      'cli/**/*.test.ts',
      'core/**/*.test.ts',
      'services/**/*.test.ts',
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    alias: {
      '@core': resolve(__dirname, './core'),
      '@services': resolve(__dirname, './services'),
      '@api': resolve(__dirname, './api'),
      '@cli': resolve(__dirname, './cli'),
      '@tests': resolve(__dirname, './tests')
    }
  }
});
