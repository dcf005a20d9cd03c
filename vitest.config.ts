import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    pool: 'forks',
    // Integration tests share the tree-sitter parser singleton
    fileParallelism: false,
    sequence: {
      concurrent: false,
    },
  },
});
