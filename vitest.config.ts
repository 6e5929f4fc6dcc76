import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@session-service/observability': packageSource('observability'),
      '@session-service/config': packageSource('config'),
      '@session-service/persistence': packageSource('persistence'),
      '@session-service/auth': packageSource('auth'),
      '@session-service/http-server': packageSource('http-server'),
      '@session-service/server': packageSource('server'),
    },
  },
  test: {
    environment: 'node',

    // Set NODE_ENV for test detection (silences the logger)
    env: {
      NODE_ENV: 'test',
    },

    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/**/src/**/*.d.ts', 'packages/server/src/main.ts'],
    },

    // Enable global APIs like describe, it, expect
    globals: true,

    testTimeout: 10000,
    retry: 0,
    reporters: ['default'],
  },
});
