import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // tree-sitter is a native addon; child processes load it more reliably than worker threads
    pool: 'forks',
  },
});
