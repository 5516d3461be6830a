import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // lxc polling tests drive a fake clock, nothing here waits on real time
    testTimeout: 5000,
  },
});
