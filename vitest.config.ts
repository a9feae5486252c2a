import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/tests/unit/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        env: {
            NODEFLOW_LOG_LEVEL: 'silent',
        },
        testTimeout: 15000,
        hookTimeout: 15000,
    },
});
