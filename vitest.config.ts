import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@blogflow/protocol': fileURLToPath(new URL('./packages/protocol/src/index.ts', import.meta.url)),
            '@blogflow/auth': fileURLToPath(new URL('./packages/auth/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
        globals: false, // We are importing globals explicitly
        environment: 'node',
        setupFiles: './apps/review-pod/src/vitest.setup.ts',
        testTimeout: 10000,
    },
});
