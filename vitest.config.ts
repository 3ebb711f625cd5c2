import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/core/src/**/*.test.ts', 'packages/dock-cli/src/**/*.test.ts'],
  },
});
