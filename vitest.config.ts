import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['engine/test/**/*.test.ts', 'cli/test/**/*.test.ts'],
    },
});
