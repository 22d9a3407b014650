import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'tests/',
        '**/*.d.ts',
        '**/*.config.*',
        '**/dist/**'
      ]
    },
    testTimeout: 30000
  },
  resolve: {
    alias: {
      '@tenki/shared': packageSource('shared'),
      '@tenki/client': packageSource('client'),
      '@tenki/cli': packageSource('cli')
    }
  }
});
