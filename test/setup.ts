import 'reflect-metadata';

// Shared environment for e2e tests.
// Vitest runs this file before each test file via setupFiles in vitest.config.ts.

process.env.LOG_LEVEL = 'silent';
process.env.SIMULATION_CONFIG_PATH = 'test/fixtures/simulation.yaml';
