import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

const PACKAGES = ['types', 'utils', 'http', 'resolver', 'assets', 'rewrite', 'bundle', 'cli'];

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts', 'test/**/*.test.ts'],
        setupFiles: ['./test/setup.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/run.ts', 'packages/*/src/index.ts'],
        },
    },
    resolve: {
        alias: {
            ...Object.fromEntries(
                PACKAGES.map((name) => [
                    `@trialpack/${name}`,
                    resolve(`./packages/${name}/src/index.ts`),
                ]),
            ),
            trialpack: resolve('./packages/trialpack/src/index.ts'),
        },
    },
});
