import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['rbac-engine/test/**/*.test.ts'],
    environment: 'node',
  },
});
