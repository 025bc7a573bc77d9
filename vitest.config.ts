import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'game/src/**/*.test.ts'],
    environment: 'node'
  }
});
