import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        // download tests call process.chdir, which worker threads reject
        pool: 'forks',
        include: ['tests/**/*.test.ts'],
        // in-process stand-in servers listen on 127.0.0.1
        env: {
            NO_PROXY: '127.0.0.1,localhost',
            no_proxy: '127.0.0.1,localhost',
        },
        coverage: {
            provider: 'v8',
            reporter: ['text', 'text-summary', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: ['src/cli.ts', 'src/index.ts', 'src/**/index.ts'],
        },
    },
});
