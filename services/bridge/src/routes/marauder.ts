// services/bridge/src/routes/marauder.ts

import { existsSync } from 'node:fs'
import { basename } from 'node:path'
import type { FastifyPluginAsync, FastifyReply } from 'fastify'
import type { LinkErrorCode } from '../core/errors.js'

interface LimitQuery {
    n?: number
}

const limitQuerySchema = {
    type: 'object',
    properties: { n: { type: 'integer', minimum: 0 } },
} as const

function statusForCode(code: LinkErrorCode | null): number {
    switch (code) {
        case 'PORT_NOT_FOUND':
            return 404
        case 'INVALID_ARGUMENT':
            return 400
        case 'NOT_CONNECTED':
            return 409
        default:
            return 502
    }
}

/** `{ port }` is optional and the body may be missing altogether. */
function readPort(body: unknown): string | undefined {
    if (typeof body !== 'object' || body === null || !('port' in body)) return undefined
    return typeof body.port === 'string' ? body.port : undefined
}

/**
 * HTTP surface over the marauder engine for the external display.
 * Expects the marauder plugin to have decorated the instance.
 */
const marauderRoutes: FastifyPluginAsync = async (app) => {
    const engine = app.marauderEngine

    /** Command routes share one reply shape: link state plus the failure reason. */
    const commandReply = (reply: FastifyReply, ok: boolean) => {
        const link = engine.getLinkState()
        if (ok) return { ok: true, link }
        const code = engine.lastFailureCode()
        reply.code(statusForCode(code))
        return { ok: false, error: engine.lastActivity() ?? 'command failed', code, link }
    }

    // ---- status ------------------------------------------------------------

    app.get('/api/health', async () => ({
        status: 'ok',
        connected: app.marauderLink.isConnected(),
        phase: app.marauderLink.getPhase(),
        events: app.marauderTelemetry.snapshotCounters(),
    }))

    app.get('/api/state', async () => engine.getSnapshot())

    app.get<{ Querystring: LimitQuery }>(
        '/api/serial/raw',
        { schema: { querystring: limitQuerySchema } },
        async (req) => ({ lines: app.marauderLink.getRawHistory(req.query.n) })
    )

    app.get<{ Querystring: LimitQuery }>(
        '/api/logs',
        { schema: { querystring: limitQuerySchema } },
        async (req) => ({ logs: app.clientBuf.getLatest(req.query.n ?? 200) })
    )

    // ---- link --------------------------------------------------------------

    app.post('/api/link/connect', async (req, reply) => {
        const result = await engine.connect(readPort(req.body))
        if (result.ok) return { ok: true, port: result.port }
        reply.code(statusForCode(result.code))
        return { ok: false, error: result.error, code: result.code }
    })

    app.post('/api/link/disconnect', async () => {
        await engine.disconnect()
        return { ok: true, link: engine.getLinkState() }
    })

    // ---- scans -------------------------------------------------------------

    app.post('/api/scan/wifi', async (_req, reply) => commandReply(reply, await engine.startWifiScan()))
    app.post('/api/scan/stations', async (_req, reply) => commandReply(reply, await engine.startStationScan()))
    app.post('/api/scan/ble', async (_req, reply) => commandReply(reply, await engine.startBleScan()))
    app.post('/api/scan/stop', async (_req, reply) => commandReply(reply, await engine.stopScan()))

    // ---- attacks -----------------------------------------------------------

    app.post<{ Body: { apIndex: number } }>(
        '/api/attack/deauth',
        {
            schema: {
                body: {
                    type: 'object',
                    required: ['apIndex'],
                    properties: { apIndex: { type: 'integer' } },
                },
            },
        },
        async (req, reply) => commandReply(reply, await engine.attackDeauth(req.body.apIndex))
    )

    app.post('/api/attack/beacon', async (_req, reply) => commandReply(reply, await engine.attackBeaconFlood()))
    app.post('/api/attack/rickroll', async (_req, reply) => commandReply(reply, await engine.attackRickroll()))

    app.post<{ Body: { target: string } }>(
        '/api/attack/blespam',
        {
            schema: {
                body: {
                    type: 'object',
                    required: ['target'],
                    properties: { target: { type: 'string' } },
                },
            },
        },
        async (req, reply) => commandReply(reply, await engine.bleSpam(req.body.target))
    )

    // ---- terminal + results ------------------------------------------------

    app.post<{ Body: { command: string } }>(
        '/api/serial/command',
        {
            schema: {
                body: {
                    type: 'object',
                    required: ['command'],
                    properties: { command: { type: 'string' } },
                },
            },
        },
        async (req, reply) => commandReply(reply, await engine.sendRaw(req.body.command))
    )

    app.post('/api/results/clear', async () => {
        engine.clearResults()
        return { ok: true }
    })

    // ---- sessions ----------------------------------------------------------

    app.get('/api/sessions', async () => ({
        recording: engine.isRecording(),
        sessions: engine.listSessions().map((p) => basename(p)),
    }))

    app.post('/api/sessions/start', async () => {
        const path = engine.startSession()
        return { ok: true, session: basename(path) }
    })

    app.post('/api/sessions/stop', async () => {
        const path = engine.stopSession()
        return { ok: true, session: path ? basename(path) : null }
    })

    app.post<{ Body: { name: string } }>(
        '/api/sessions/export',
        {
            schema: {
                body: {
                    type: 'object',
                    required: ['name'],
                    properties: { name: { type: 'string', minLength: 1 } },
                },
            },
        },
        async (req, reply) => {
            const sessionPath = engine.sessionPathFor(req.body.name)
            if (!existsSync(sessionPath)) {
                reply.code(404)
                return { ok: false, error: `session not found: ${basename(sessionPath)}` }
            }

            const result = engine.exportSession(sessionPath)
            if (!result.ok) {
                reply.code(500)
                return { ok: false, error: result.error }
            }
            return { ok: true, csvFile: basename(result.csvPath), csv: result.csv }
        }
    )
}

export default marauderRoutes
