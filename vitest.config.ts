import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    name: 'tapdash',
    include: ['src/**/__tests__/*.test.ts', 'src/**/__tests__/*.test.tsx'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      TAPDASH_LOG_FILE: 'false',
    },
  },
});
