import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      exclude: ['*.config.ts', 'src/index.ts'],
    },
  },
});
