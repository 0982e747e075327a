import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const workspaceRoot = path.dirname(fileURLToPath(import.meta.url));
const resolveAlias = {
  '@pushgate/core-logging': path.join(workspaceRoot, 'packages/core-logging/src/index.ts'),
  '@pushgate/core-validation': path.join(workspaceRoot, 'packages/core-validation/src/index.ts'),
  '@pushgate/core-labels': path.join(workspaceRoot, 'packages/core-labels/src/index.ts'),
  '@pushgate/core-exposition': path.join(workspaceRoot, 'packages/core-exposition/src/index.ts'),
  '@pushgate/core-pushgateway': path.join(workspaceRoot, 'packages/core-pushgateway/src/index.ts')
};

export default defineConfig({
  resolve: {
    alias: resolveAlias
  },
  test: {
    environment: 'node',
    globals: true,
    reporters: ['default'],
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['**/tests/**', '**/*.d.ts']
    }
  }
});
