export const sharedVitestConfig = {
  test: {
    globals: true,
    silent: true,
    restoreMocks: true,
    coverage: {
      provider: 'v8' as const,
      reporter: ['text', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/vitest-config/**',
        // Type-only contracts have no runtime to execute.
        'packages/core/src/types/**/*.ts',
        'packages/core/src/stores/cache-store.ts',
      ],
      thresholds: {
        lines: 95,
        functions: 95,
        branches: 90,
        statements: 95,
      },
    },
  },
};
