import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export their built output; tests run on the sources.
const workspaceSource = (name: string): string =>
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@invoice-recon/shared': workspaceSource('shared'),
            '@invoice-recon/core': workspaceSource('core'),
        },
    },
    test: {
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/index.ts'],
        },
    },
});
