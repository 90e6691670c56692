import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    watch: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 5000,
  },
});
