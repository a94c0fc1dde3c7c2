import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packages = ['types', 'crypto', 'chain', 'merkle', 'consensus', 'simulation', 'cli'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@ledgerwork/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 30_000,
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/cli/src/main.ts'],
      reporter: ['text', 'text-summary'],
    },
  },
});
