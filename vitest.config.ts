import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts', 'tests/**/*.property.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    // Property tests run many iterations per case
    testTimeout: 30000,
  }
});
