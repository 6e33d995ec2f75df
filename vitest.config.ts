import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    env: {
      API_KEY: 'test-api-key',
      EMBED_SECRET: 'test-secret',
    },
  },
});
