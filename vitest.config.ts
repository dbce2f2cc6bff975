import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    // Scripts may change the working directory, which worker threads do not allow
    pool: 'forks',
    poolOptions: {
      forks: {
        // Lets the leak tests force a collection
        execArgv: ['--expose-gc']
      }
    },
    env: {
      NODE_ENV: 'test'
    },
    globals: true,
    include: [
      'core/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'sdk/**/*.test.ts',
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ]
  }
});
