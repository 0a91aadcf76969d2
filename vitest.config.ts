import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

function fromRoot(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Each test file in its own worker so module state never leaks between files
    isolate: true,
    pool: 'threads',

    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        'src/boot/main.ts',
        'src/**/types.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
  },
  resolve: {
    // Mirrors "paths" in tsconfig.json
    alias: {
      '$types': fromRoot('./src/types'),
      '$test-utils': fromRoot('./test'),
      '@boot': fromRoot('./src/boot'),
      '@core': fromRoot('./src/core'),
      '@features': fromRoot('./src/features'),
      '@hardware': fromRoot('./src/hardware'),
      '@logging': fromRoot('./src/logging'),
      '@notifications': fromRoot('./src/notifications'),
      '@storage': fromRoot('./src/storage'),
      '@system': fromRoot('./src/system'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
    },
  },
})
