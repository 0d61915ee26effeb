import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    // cable e2e specs open real loopback sockets
    testTimeout: 10_000,
    clearMocks: true,
    restoreMocks: true,
  },
});
