import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['cohort_core/__tests__/**/*.test.ts'],
        setupFiles: ['cohort_core/__tests__/setup.ts'],
    },
});
