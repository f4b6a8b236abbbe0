import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    env: {
      RPC_ENDPOINT: 'http://localhost:26657',
      ORACLE_ADDRESS: 'cosmos1oracleqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqq',
      OWNER_ACCOUNT_ID: 'owner',
      LOG_LEVEL: 'error',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/api/server.ts',
        'src/utils/logger.ts',
        'src/config/index.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    server: {
      deps: {
        // load graphql once, so tests and @apollo/@graphql-tools share one realm
        inline: ['graphql', /@graphql-tools\//, /@apollo\//],
      },
    },
    testTimeout: 30000,
    sequence: {
      shuffle: false,
    },
  },
});
