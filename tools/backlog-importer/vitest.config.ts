import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // Jira executor tests spawn fixture scripts through tsx.
    testTimeout: 15_000,
  },
});
