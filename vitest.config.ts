import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        test: {
          name: 'integration',
          // The fake Base service runs in-process behind fastify.inject(); no sockets.
          include: ['tests/integration/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
    ],
  },
});
