import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
    env: { LOG_LEVEL: 'error' },
  },
  resolve: {
    alias: {
      '@profilescout/agents': fromRoot('./agents/src/index.ts'),
      '@profilescout/core': fromRoot('./packages/core/src/index.ts'),
      '@profilescout/llm': fromRoot('./packages/llm/src/index.ts'),
      '@profilescout/schemas': fromRoot('./packages/schemas/src/index.ts'),
    },
  },
});
