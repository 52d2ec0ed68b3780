import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Child processes and signal handlers need a real process, not a worker thread
    pool: 'forks',
  },
});
