import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/index.ts', 'packages/ispctl/src/frame-io.ts'],
      thresholds: {
        statements: 95,
        branches: 90,
        functions: 95,
        lines: 95
      }
    }
  },
  resolve: {
    alias: {
      '@softisp/color-grading': path.resolve(__dirname, 'packages/color-grading/src'),
      '@softisp/controls': path.resolve(__dirname, 'packages/controls/src'),
      '@softisp/settings': path.resolve(__dirname, 'packages/settings/src')
    }
  }
});
