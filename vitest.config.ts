import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    // specs mutate process.env and reload the runtime config
    pool: 'forks',
    maxWorkers: 1,
    minWorkers: 1,
    testTimeout: 20000,
    exclude: [
      'dist/**',
      'node_modules/**'
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: [
        'src/config/**',
        'src/services/**',
        'src/utils/**',
        'src/models/**',
        'src/versioning/**'
      ],
      exclude: [
        'dist/**',
        'src/tests/**',
        '**/*.d.ts'
      ]
    }
  }
});
