import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
   test: {
      environment: 'node',
      include: ['tests/**/*.test.ts'],
      passWithNoTests: false,
   },
   resolve: {
      alias: {
         '@utils': fileURLToPath(new URL('./src/services/utils', import.meta.url)),
         '@': fileURLToPath(new URL('./src', import.meta.url)),
      },
   },
});
