import { fileURLToPath } from 'node:url'

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
        '**/index.ts',
        '**/types.ts',
      ],
      thresholds: {
        branches: 90,
        functions: 95,
        lines: 95,
        statements: 95,
      },
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    // Mirrors the "paths" block in tsconfig.json
    alias: [
      { find: /^\$types(?=\/|$)/, replacement: fromRoot('./src/types') },
      { find: /^@utils(?=\/|$)/, replacement: fromRoot('./src/utils') },
      { find: /^@logging(?=\/|$)/, replacement: fromRoot('./src/logging') },
      { find: /^@validation(?=\/|$)/, replacement: fromRoot('./src/validation') },
      { find: /^@core(?=\/|$)/, replacement: fromRoot('./src/core') },
      { find: /^@features(?=\/|$)/, replacement: fromRoot('./src/features') },
      { find: /^@boot(?=\/|$)/, replacement: fromRoot('./src/boot') },
    ],
  },
})
