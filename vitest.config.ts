// Test runner settings for tokenfront
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'tokenfront',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
});
