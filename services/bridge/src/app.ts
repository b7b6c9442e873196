import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@marauder-link/logging'

import { readBoolEnv, readIntEnv } from './core/env.js'
import { LinkError } from './core/errors.js'
import marauderPlugin, { type MarauderPluginOptions } from './plugins/marauder.js'
import marauderRoutes from './routes/marauder.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    marauder?: MarauderPluginOptions
    /** A fresh buffer per app unless one is passed in. */
    clientBuf?: ClientLogBuffer
}

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('bridge', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    // ---- Request logging config (env) ----
    const REQUEST_VERBOSE = readBoolEnv(process.env, 'REQUEST_VERBOSE', false)
    const REQUEST_SAMPLE = Math.max(1, readIntEnv(process.env, 'REQUEST_SAMPLE', 1))

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    // CORS for the display, which is served from elsewhere
    void app.register(cors, { origin: true })

    void app.register(marauderPlugin, opts.marauder ?? {})
    void app.register(marauderRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % REQUEST_SAMPLE !== 0) return
        startedAt.set(req.id, Date.now())
        logReq.debug(`${req.method} ${req.url}`)
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        const ms = Date.now() - start
        const line = `${req.method} ${req.url} → ${reply.statusCode} (${ms} ms)`
        if (reply.statusCode >= 500) logReq.warn(line)
        else if (REQUEST_VERBOSE) logReq.info(line)
        else logReq.debug(line)
    })
    // ---------------------------------------------------

    app.setErrorHandler((err, req, reply) => {
        if (err instanceof LinkError) {
            reply.code(err.code === 'INVALID_ARGUMENT' ? 400 : 502)
            void reply.send({ ok: false, error: err.message, code: err.code })
            return
        }
        if (err.validation) {
            reply.code(400)
            void reply.send({ ok: false, error: err.message, code: 'VALIDATION' })
            return
        }

        logApp.error(`unhandled error on ${req.method} ${req.url}: ${err.message}`)
        reply.code(err.statusCode ?? 500)
        void reply.send({ ok: false, error: err.message })
    })

    app.get('/version', async () => ({ name: 'marauder-link-bridge', version: '0.1.0' }))

    logApp.info('bridge app built')
    return app
}
