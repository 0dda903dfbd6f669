import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Backend stubs in timeout tests wait on real timers
    testTimeout: 10000,
    pool: 'threads',
  },
});
