import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Backend timeout tests wait on real timers
    testTimeout: 10000,
  },
});
