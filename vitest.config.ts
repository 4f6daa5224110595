import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__vitest__/**/*.test.ts'],
    environment: 'node',
    env: {
      DEFENCE_LOG_LEVEL: 'error',
    },
  },
});
