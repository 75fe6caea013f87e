import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [
    tsconfigPaths()
  ],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test'
    },
    globals: true,
    include: [
      'core/**/*.test.ts',
      'tools/**/*.test.ts',
      'api/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['**/node_modules/**', '**/dist/**']
    }
  }
});
