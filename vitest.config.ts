import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for every workspace package.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/src/__tests__/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
    },
});
