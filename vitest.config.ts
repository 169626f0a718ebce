import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['backend/src/**/*.test.ts', 'shared/**/*.test.ts'],
        environment: 'node',
        testTimeout: 10000
    }
});
