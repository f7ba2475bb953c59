import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['backend/tests/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
        },
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['backend/src/**/*.ts'],
            exclude: ['backend/src/server.ts'],
        },
    },
});
