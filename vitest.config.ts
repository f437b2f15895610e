import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/vitest-setup.ts'],
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // ALWAYS run once and exit, never watch
    watch: false,
    bail: 0,
    hookTimeout: 10000,
    isolate: true
  },
});
