import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

const workspacePackages = ['protocol', 'utils', 'config', 'storage', 'daemon'];

export default defineConfig({
  resolve: {
    alias: [
      // Subpath imports first, then the package entries
      ...workspacePackages.map((name) => ({
        find: new RegExp(`^@decision-relay/${name}/(.+)$`),
        replacement: `${root}packages/${name}/src/$1.ts`,
      })),
      ...workspacePackages.map((name) => ({
        find: new RegExp(`^@decision-relay/${name}$`),
        replacement: `${root}packages/${name}/src/index.ts`,
      })),
    ],
  },
  test: {
    environment: 'node',
    setupFiles: ['./test/vitest.setup.ts'],
    include: [
      'src/**/*.test.ts',
      'packages/**/src/**/*.test.ts',
    ],
  },
});
