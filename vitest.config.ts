import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    root: './',
    environment: 'node',
    setupFiles: ['reflect-metadata'],
    include: ['src/**/*.spec.ts'],
    testTimeout: 20000,
  },
  plugins: [
    // Nest decorators need the emitted parameter metadata
    swc.vite({
      module: { type: 'es6' },
    }),
  ],
});
