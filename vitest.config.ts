import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['server/src/**/*.test.ts'],
    restoreMocks: true,
    unstubGlobals: true,
  },
});
