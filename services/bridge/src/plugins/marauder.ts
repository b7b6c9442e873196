// services/bridge/src/plugins/marauder.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
} from '@marauder-link/logging'
import { readBoolEnv } from '../core/env.js'
import { buildEngineConfigFromEnv, type EngineConfig } from '../core/engine/config.js'
import { MarauderEngine } from '../core/engine/MarauderEngine.js'
import { EventBus } from '../core/events/EventBus.js'
import { fmtKVs, makeBusTelemetry, type BusTelemetryWithCounters } from '../core/events/telemetry.js'
import { describeError } from '../core/errors.js'
import { MarauderLinkService } from '../devices/marauder/MarauderLinkService.js'
import type {
    LinkPortFactory,
    MarauderEvent,
    MarauderLinkConfig,
    PortLister,
} from '../devices/marauder/types.js'
import { buildLinkConfigFromEnv } from '../devices/marauder/utils.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        /** Per-kind counters for device events, reported by /api/health. */
        marauderTelemetry: BusTelemetryWithCounters
        marauderLink: MarauderLinkService
        marauderEngine: MarauderEngine
    }
}

export interface MarauderPluginOptions {
    /** Overrides on top of the MARAUDER_* env config. */
    link?: Partial<MarauderLinkConfig>
    engine?: Partial<EngineConfig>
    /** Connect when the server is ready. Defaults to MARAUDER_AUTO_CONNECT (true). */
    autoConnect?: boolean
    createPort?: LinkPortFactory
    listPorts?: PortLister
    platform?: NodeJS.Platform
}

// ---- Event observer using bridge logging -----------------------------------

/** Logs every device event on the link channel as a key=value line. */
export function makeEventLogger(log: ChannelLogger): (evt: MarauderEvent) => void {
    return (evt) => {
        switch (evt.kind) {
            case 'raw-line':
                // already logged as RX by the link service
                break

            case 'disconnected':
                log.warn(`kind=disconnected ${fmtKVs({ reason: evt.reason })}`)
                break

            case 'scan-started':
                log.info(`kind=scan-started scanType=${evt.scanType}`)
                break

            case 'scan-stopped':
                log.info('kind=scan-stopped')
                break

            default: {
                const { kind, ...fields } = evt
                log.debug(`kind=${kind} ${fmtKVs(fields)}`)
                break
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const marauderPlugin: FastifyPluginAsync<MarauderPluginOptions> = async (
    app: FastifyInstance,
    opts: MarauderPluginOptions
) => {
    const { channel } = createLogger('bridge', app.clientBuf)
    const logPlugin = channel(LogChannel.app)
    const logLink = channel(LogChannel.link)

    const linkConfig: MarauderLinkConfig = { ...buildLinkConfigFromEnv(), ...opts.link }
    const engineConfig: EngineConfig = { ...buildEngineConfigFromEnv(), ...opts.engine }
    const autoConnect = opts.autoConnect ?? readBoolEnv(process.env, 'MARAUDER_AUTO_CONNECT', true)

    logPlugin.info(
        `marauder config ${fmtKVs({
            port: linkConfig.portPath || '<auto>',
            baudRate: linkConfig.baudRate,
            reconnectDelayMs: linkConfig.reconnectDelayMs,
            sessionsDir: engineConfig.sessionsDir,
            autoConnect,
        })}`
    )

    const telemetry = makeBusTelemetry(channel(LogChannel.bus))
    const bus = new EventBus<MarauderEvent>({ telemetry })
    bus.subscribe(makeEventLogger(logLink), { name: 'event-logger' })

    const link = new MarauderLinkService(linkConfig, {
        events: bus,
        log: logLink,
        createPort: opts.createPort,
        listPorts: opts.listPorts,
        platform: opts.platform,
    })

    const engine = new MarauderEngine(engineConfig, {
        link,
        bus,
        log: channel(LogChannel.engine),
        sessionLog: channel(LogChannel.session),
        telemetry: makeBusTelemetry(channel(LogChannel.bus)),
    })
    engine.start()

    // Expose on Fastify instance so routes can use them.
    app.decorate('marauderTelemetry', telemetry)
    app.decorate('marauderLink', link)
    app.decorate('marauderEngine', engine)

    app.addHook('onReady', async () => {
        if (!autoConnect) return
        logPlugin.info('auto-connecting to marauder')
        const result = await engine.connect()
        if (!result.ok) {
            logPlugin.warn(`auto-connect failed; use POST /api/link/connect to retry (${result.error})`)
        }
    })

    app.addHook('onClose', async () => {
        logPlugin.info('stopping marauder link')
        engine.stop()
        await link.disconnect().catch((err: unknown) => {
            logPlugin.warn('error closing marauder link', { err: describeError(err) })
        })
    })
}

export default fp(marauderPlugin, {
    name: 'marauder-plugin',
})
