import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/test/**/*.test.ts'],
    environment: 'node',
    env: {
      TERMJUDGE_LOG_LEVEL: 'silent'
    }
  }
});
