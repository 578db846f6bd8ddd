import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['server/tests/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'silent',
        },
        testTimeout: 20000,
        hookTimeout: 30000,
    },
});
