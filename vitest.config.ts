import { fileURLToPath } from 'node:url';

const sharedDir = fileURLToPath(new URL('./shared', import.meta.url));

export default {
  test: {
    include: ['tests/**/*.spec.ts', 'shared/**/*.spec.ts'],
    environment: 'node',
    alias: {
      '@shared': sharedDir,
    },
  },
  resolve: {
    alias: {
      '@shared': sharedDir,
    },
  },
};
