import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'tools/logger',
      'packages/shared',
      'packages/pdf-parser',
      'packages/toc-detector',
      'apps/cli',
    ],
  },
});
