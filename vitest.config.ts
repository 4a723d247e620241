import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
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
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    // Mirrors the `paths` in tsconfig.json
    alias: {
      '$types': fromRoot('./src/types'),
      '@boot': fromRoot('./src/boot'),
      '@codec': fromRoot('./src/codec'),
      '@core': fromRoot('./src/core'),
      '@features': fromRoot('./src/features'),
      '@logging': fromRoot('./src/logging'),
      '@stream': fromRoot('./src/stream'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
    },
  },
})
