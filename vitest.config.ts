import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/http-client-core': fileURLToPath(
    new URL('./libs/http-client-core/src/index.ts', import.meta.url),
  ),
  '@libs/battlenet-client': fileURLToPath(
    new URL('./libs/battlenet-client/src/index.ts', import.meta.url),
  ),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/**/src/**/__tests__/**/*.test.ts', 'tools/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
