import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['types/**/*.vitest.test.ts'],
    globals: true,
    reporters: ['default']
  }
});
