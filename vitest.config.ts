import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['agents/**/tests/**/*.test.ts', 'packages/**/tests/**/*.test.ts'],
    environment: 'node',
  },
});
