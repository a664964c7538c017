import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['pointkit/tests/**/*.test.ts'],
  },
});
