import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.spec.ts'],
        environment: 'node',
        // tree-sitter is a native addon; keep each spec file in its own process
        pool: 'forks',
    },
});
