import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['setlist-reconcile/src/**/*.test.ts'],
    environment: 'node'
  }
});
