import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Tests never reach a real database, Redis or SMTP server.
    env: {
      NODE_ENV: 'test',
      SECRET_KEY: 'test-secret',
    },
  },
});
