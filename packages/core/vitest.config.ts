import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    // Property tests over full candidate spaces can take a while
    testTimeout: 10000,
    env: {
      // fast-check run count for property tests
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
