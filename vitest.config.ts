import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': resolve(fileURLToPath(new URL('.', import.meta.url))),
        },
    },
    test: {
        environment: 'node',
        include: ['__tests__/**/*.test.ts'],
    },
});
