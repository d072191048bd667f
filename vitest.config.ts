import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['patterns/**/*.test.ts', 'advisor/**/*.test.ts'],
  },
});
