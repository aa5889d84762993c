import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    setupFiles: ['packages/pairwise/tests/setup.ts'],
    restoreMocks: true,
  },
});
