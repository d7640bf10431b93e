import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

function source(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@tiercache\/types$/, replacement: source('./packages/types/src/index.ts') },
      { find: /^@tiercache\/types\/services$/, replacement: source('./packages/types/src/services/index.ts') },
      { find: /^@tiercache\/core$/, replacement: source('./packages/core/src/index.ts') },
      { find: /^@tiercache\/http-client$/, replacement: source('./packages/http-client/src/index.ts') },
      { find: /^@tiercache\/test-utils$/, replacement: source('./packages/test-utils/src/index.ts') },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000,
  },
});
