import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Tests never read provider keys; keep a repo-root `.env` out of the test process.
  envDir: 'src',
  test: {
    globals: false,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
  },
});
