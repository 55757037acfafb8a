import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    // הלוגרים שקטים בבדיקות
    env: {
      LOG_TO_CONSOLE: 'false',
    },
  },
});
