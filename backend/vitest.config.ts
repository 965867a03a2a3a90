import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@shared': fileURLToPath(new URL('../shared', import.meta.url))
    }
  },
  test: {
    name: 'backend',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      RATE_LIMIT_MAX_REQUESTS: '1000',
      LOG_LEVEL: 'error'
    }
  }
});
