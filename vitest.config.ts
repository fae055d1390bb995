import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/tests/**/*.spec.ts'],
    testTimeout: 15000,
    watch: false,
  },
});
