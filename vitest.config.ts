import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sncloud/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
