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
      exclude: ['packages/ctl/src/index.ts', 'packages/engine/src/test-support/**', '**/*.test.ts']
    }
  },
  resolve: {
    alias: {
      '@pressplay/models': path.resolve(__dirname, 'packages/models/src'),
      '@pressplay/bridge': path.resolve(__dirname, 'packages/bridge/src'),
      '@pressplay/settings': path.resolve(__dirname, 'packages/settings/src'),
      '@pressplay/engine': path.resolve(__dirname, 'packages/engine/src')
    }
  }
});
