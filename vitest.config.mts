import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages_mjs/*/tests/**/*.test.mts'],
    globals: false,
    environment: 'node',
    env: {
      FLAGWIRE_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages_mjs/*/src/**/*.mts'],
    },
  },
});
