import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolvePackage = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@boxcast/core': resolvePackage('./packages/core/src/index.ts'),
      '@boxcast/three': resolvePackage('./packages/three/src/index.ts'),
      '@boxcast/react': resolvePackage('./packages/react/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
