import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

function workspace(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@layerstack/types': workspace('./packages/types/src/index.ts'),
      '@layerstack/core': workspace('./packages/core/src/index.ts'),
      '@layerstack/render': workspace('./packages/render/src/index.ts'),
      '@layerstack/editor': workspace('./packages/editor/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/**/index.ts',
        'packages/*/src/test-helpers.ts',
      ],
    },
  },
});
