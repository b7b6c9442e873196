import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
    resolve: {
        alias: {
            '@marauder-link/logging': fileURLToPath(new URL('./packages/logging/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts', 'services/*/tests/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'silent',
            PRETTY_LOGS: 'false',
        },
    },
})
