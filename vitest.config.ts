import { defineConfig } from 'vitest/config';
import swc from 'unplugin-swc';

export default defineConfig({
  test: {
    globals: true,
    root: './',
    include: ['src/**/*.{test,spec}.ts', 'test/**/*.e2e-spec.ts'],
    setupFiles: ['test/setup.ts'],
  },
  plugins: [
    // SWC keeps decorator metadata, which esbuild drops
    swc.vite({
      module: { type: 'es6' },
    }),
  ],
});
