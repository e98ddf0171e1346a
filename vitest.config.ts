import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = resolve(fileURLToPath(new URL('.', import.meta.url)));

export default defineConfig({
    resolve: {
        alias: {
            '@': rootDir,
        },
    },
    test: {
        environment: 'node',
        include: ['lib/__tests__/**/*.test.ts', 'app/**/*.test.ts'],
    },
});
