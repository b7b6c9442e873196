import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import { createLogger, LogChannel } from '@marauder-link/logging'
import { buildApp } from './app.js'
import { readIntEnv } from './core/env.js'
import { describeError } from './core/errors.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
function loadEnv(): void {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
}

async function start(): Promise<void> {
    loadEnv()

    const { channel } = createLogger('bridge')
    const logApp = channel(LogChannel.app)

    const PORT = readIntEnv(process.env, 'PORT', 3080)
    const HOST = process.env.HOST ?? '127.0.0.1'

    const app = buildApp()

    try {
        await app.listen({ port: PORT, host: HOST })
        logApp.info(`listening host=${HOST} port=${PORT} env=${process.env.NODE_ENV ?? 'development'}`)
    } catch (err) {
        logApp.error(`failed to start err="${describeError(err)}"`)
        await app.close().catch((closeErr: unknown) => {
            logApp.warn('error closing after failed start', { err: describeError(closeErr) })
        })
        process.exit(1)
    }

    // Graceful shutdown
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        try {
            logApp.info(`received ${signal}, shutting down`)
            await app.close()
            logApp.info('bridge closed')
            process.exit(0)
        } catch (err) {
            logApp.error('error during shutdown', { err: describeError(err) })
            process.exit(1)
        }
    }
    process.on('SIGINT', () => void shutdown('SIGINT'))
    process.on('SIGTERM', () => void shutdown('SIGTERM'))
}

void start()
