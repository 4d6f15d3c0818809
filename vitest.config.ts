import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration: one project per workspace package.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    // Each package carries its own vitest.config.ts
    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

  },
});
