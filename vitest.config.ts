import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/**/__tests__/**/*.{test,spec}.ts'],
  },
});
