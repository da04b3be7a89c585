// Configuracion de Vitest para todo el monorepo.
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/tests/**/*.test.ts'],
    setupFiles: ['apps/backend/tests/setup.ts']
  }
});
