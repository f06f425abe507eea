
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      './src/**/*.{test,spec}.ts',
    ],
    env: {
      LOG_LEVEL: 'silent',
    },
    reporters: [
      'default',
    ],
    coverage: {
      include: [
        'src/**/*.ts',
      ],
      exclude: [
        'src/**/*.test.ts',
        'src/test/**',
      ],
      all: true,
      provider: 'istanbul',
      reporter: [
        'cobertura',
        'html',
      ],
    },
  },
});
