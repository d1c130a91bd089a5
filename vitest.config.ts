import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    env: { LOG_LEVEL: 'silent' },
    include: ['api/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**']
  }
});
