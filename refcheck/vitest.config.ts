import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'lib/**/*.test.ts',
      'link-checker/**/*.test.ts',
      'commands/**/*.test.ts',
    ],
    root: fileURLToPath(new URL('.', import.meta.url)),
  },
});
