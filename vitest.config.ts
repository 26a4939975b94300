import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: [
            // drizzle-kit's ESM api bundle does a dynamic require("fs"), which
            // fails under ESM; load its CommonJS build instead.
            { find: /^drizzle-kit\/api$/, replacement: path.resolve(__dirname, 'node_modules/drizzle-kit/api.js') },
        ],
    },
    test: {
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts'],
        // PGlite boots a WASM Postgres per test file
        testTimeout: 30000,
        hookTimeout: 60000,
    },
});
