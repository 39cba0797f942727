import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(rootDir, 'node/src'),
    },
  },
  test: {
    include: ['node/tests/**/*.test.ts'],
    environment: 'node',
    env: { LOG_LEVEL: 'fatal' },
  },
});
