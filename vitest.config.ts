import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['shared/tests/**/*.test.ts', 'api/tests/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        environment: 'node',
        restoreMocks: true,
        setupFiles: ['tests/setup.ts'],
        testTimeout: 5000
    }
});
