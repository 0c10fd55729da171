import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/__tests__/setup.ts'],
    env: {
      NODE_ENV: 'test',
      PORT: '3001',
      CORS_ORIGIN: 'http://localhost:5173',
      ANTHROPIC_API_KEY: 'test-anthropic-key',
      // Retries happen immediately in tests; suites await queue.onIdle().
      JOB_RETRY_DELAY_MS: '0',
      JOB_MAX_ATTEMPTS: '3',
      WORKER_CONCURRENCY: '2',
    },
    coverage: {
      provider: 'v8',
      include: ['src/services/**', 'src/jobs/**', 'src/utils/**'],
      reporter: ['text', 'lcov'],
    },
  },
});
