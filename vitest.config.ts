import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url))

const sharedAliases = {
  '@shared': fromRoot('./src/main/shared'),
  '@infra': fromRoot('./src/main/infrastructure'),
  '@main': fromRoot('./src/main'),
  '@config': fromRoot('./src/main/config'),
  '@core': fromRoot('./src/main/core')
}

export default defineConfig({
  resolve: {
    alias: sharedAliases
  },
  test: {
    globals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      include: ['src/main/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'tests/**', 'dist/**', '**/*.config.ts', '**/index.ts'],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80
      }
    },
    projects: [
      {
        resolve: {
          alias: sharedAliases
        },
        test: {
          name: 'node',
          globals: true,
          include: ['tests/unit/**/*.spec.ts'],
          exclude: ['node_modules/**', 'dist/**'],
          environment: 'node',
          setupFiles: ['tests/setup.ts']
        }
      }
    ]
  }
})
