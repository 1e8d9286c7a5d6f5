import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/applyflow/__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            APPLYFLOW_LOG_LEVEL: 'error',
        },
    },
});
