import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts', 'src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/core/types.ts',
        'src/index.ts',
        'src/**/__tests__/helpers.ts',
        // Command actions are covered through their runXAction functions.
        'src/cli/index.ts',
      ],
    },
  },
})
