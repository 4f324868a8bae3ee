import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['skillsync/src/**/*.test.ts'],
    environment: 'node',
  },
});
