import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    // Forks keep each test file in its own process
    pool: 'forks',

    // Test isolation (each test file gets fresh environment)
    isolate: true,

    environment: 'node',

    // Setup files
    setupFiles: ['./src/__tests__/setup.ts'],

    // Test inclusion/exclusion
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,

    // Reporters
    reporters: ['default'],
  },
})
