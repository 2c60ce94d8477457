import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Child processes, so tests can change process.env.TZ and have Date follow it
    pool: 'forks',
  },
});
