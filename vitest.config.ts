import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    typecheck: {
      enabled: true,
    },
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      include: ['src'],
      exclude: ['__tests__', '__mocks__', 'src/types'],
    },
    setupFiles: ['__tests__/_setup'],
    include: ['__tests__/**/*.test.ts'],
    forceRerunTriggers: ['**/vitest.config.*/**', '**/__mocks__/**/*', '__tests__/_setup.ts'],
    alias: {
      '@/tests/': fromRoot('./__tests__/'),
      '@/mocks/': fromRoot('./__mocks__/'),
      '@/': fromRoot('./src/'),
    },
  },
});
