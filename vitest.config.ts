import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['apps/api/test/**/*.test.ts', 'packages/**/src/**/*.test.ts'],
        setupFiles: ['apps/api/src/test/setup.ts'],
        restoreMocks: true,
    },
});
