import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { FastifyInstance } from 'fastify'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { buildApp } from '../../src/app.js'
import { makePortFactory } from '../helpers/fakes.js'

let dir: string
let app: FastifyInstance
let factory: ReturnType<typeof makePortFactory>
let available: string[]
let closed: boolean

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'marauder-routes-'))
    factory = makePortFactory()
    available = ['/dev/ttyUSB0']
    closed = false
    app = buildApp({
        marauder: {
            autoConnect: false,
            createPort: factory.createPort,
            listPorts: async () => available.map((path) => ({ path })),
            platform: 'linux',
            link: { resetPulseMs: 0, reconnectDelayMs: 20, closeTimeoutMs: 100 },
            engine: { sessionsDir: dir },
        },
    })
})

afterEach(async () => {
    if (!closed) await app.close()
    rmSync(dir, { recursive: true, force: true })
})

async function connect(): Promise<void> {
    const res = await app.inject({ method: 'POST', url: '/api/link/connect', payload: {} })
    expect(res.statusCode).toBe(200)
}

describe('status routes', () => {
    it('reports health', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/health' })
        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({
            status: 'ok',
            connected: false,
            phase: 'disconnected',
            events: { published: {}, delivered: {}, handlerThrew: {} },
        })
    })

    it('counts device events in health', async () => {
        await connect()
        factory.last().feed('-42 ESSID: Lab Ch: 6 BSSID: aa:bb:cc:dd:ee:ff\n')

        await vi.waitFor(async () => {
            const res = await app.inject({ method: 'GET', url: '/api/health' })
            expect(res.json()).toMatchObject({
                connected: true,
                events: { published: { 'ap-found': 1 }, delivered: { 'ap-found': 2 }, handlerThrew: {} },
            })
        })
    })

    it('serves the engine snapshot with collected access points', async () => {
        await connect()
        factory.last().feed('-42 ESSID: Lab Ch: 6 BSSID: aa:bb:cc:dd:ee:ff\n')

        await vi.waitFor(async () => {
            const res = await app.inject({ method: 'GET', url: '/api/state' })
            expect(res.json()).toMatchObject({
                link: { port: '/dev/ttyUSB0', connected: true, currentScan: null, phase: 'connected', recording: false },
                accessPoints: [{ ssid: 'Lab', bssid: 'AA:BB:CC:DD:EE:FF', channel: 6, rssi: -42 }],
            })
        })
    })

    it('returns the tail of the raw serial history', async () => {
        await connect()
        factory.last().feed('one\ntwo\nthree\n')

        await vi.waitFor(async () => {
            const res = await app.inject({ method: 'GET', url: '/api/serial/raw?n=2' })
            expect(res.json()).toEqual({ lines: ['two', 'three'] })
        })
    })

    it('returns recent client logs', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/logs?n=2' })
        const body = res.json<{ logs: Array<{ message: string }> }>()
        expect(body.logs).toHaveLength(2)
    })
})

describe('link routes', () => {
    it('connects to the auto-detected port', async () => {
        const res = await app.inject({ method: 'POST', url: '/api/link/connect', payload: {} })
        expect(res.json()).toEqual({ ok: true, port: '/dev/ttyUSB0' })
        expect(factory.last().path).toBe('/dev/ttyUSB0')
    })

    it('connects to an explicit port', async () => {
        const res = await app.inject({ method: 'POST', url: '/api/link/connect', payload: { port: '/dev/ttyS7' } })
        expect(res.json()).toEqual({ ok: true, port: '/dev/ttyS7' })
    })

    it('answers 404 when no port can be found', async () => {
        available = []
        const res = await app.inject({ method: 'POST', url: '/api/link/connect' })
        expect(res.statusCode).toBe(404)
        expect(res.json()).toEqual({
            ok: false,
            code: 'PORT_NOT_FOUND',
            error: 'No serial port specified and auto-detection found nothing. Looked for: /dev/ttyUSB*, /dev/ttyACM*',
        })
    })

    it('disconnects', async () => {
        await connect()
        const res = await app.inject({ method: 'POST', url: '/api/link/disconnect' })
        expect(res.json()).toEqual({ ok: true, link: { port: '/dev/ttyUSB0', connected: false, currentScan: null } })
        expect(factory.last().isOpen).toBe(false)
    })
})

describe('command routes', () => {
    it('answers 409 while the link is down', async () => {
        const res = await app.inject({ method: 'POST', url: '/api/scan/wifi' })
        expect(res.statusCode).toBe(409)
        expect(res.json()).toEqual({
            ok: false,
            error: 'Command failed (scanap): Serial port is not open.',
            code: 'NOT_CONNECTED',
            link: { port: null, connected: false, currentScan: null },
        })
    })

    it.each<[string, string, string]>([
        ['/api/scan/wifi', 'scanap\n', 'wifi_ap'],
        ['/api/scan/stations', 'scansta\n', 'wifi_sta'],
        ['/api/scan/ble', 'sniffbt\n', 'ble'],
        ['/api/attack/beacon', 'attack -t beacon -r\n', 'attack_beacon'],
        ['/api/attack/rickroll', 'attack -t rickroll\n', 'attack_rickroll'],
    ])('%s writes %j', async (url, written, scan) => {
        await connect()
        const res = await app.inject({ method: 'POST', url })
        expect(res.statusCode).toBe(200)
        expect(res.json()).toMatchObject({ ok: true, link: { currentScan: scan } })
        expect(factory.last().writes).toEqual([written])
    })

    it('stops a scan', async () => {
        await connect()
        await app.inject({ method: 'POST', url: '/api/scan/ble' })
        const res = await app.inject({ method: 'POST', url: '/api/scan/stop' })
        expect(res.json()).toMatchObject({ ok: true, link: { currentScan: null } })
        expect(factory.last().writes).toEqual(['sniffbt\n', 'stopscan\n'])
    })

    it('validates the deauth body', async () => {
        await connect()
        const res = await app.inject({ method: 'POST', url: '/api/attack/deauth', payload: {} })
        expect(res.statusCode).toBe(400)
        expect(res.json()).toMatchObject({ ok: false, code: 'VALIDATION' })
    })

    it('rejects an unknown AP index with 400', async () => {
        await connect()
        const res = await app.inject({ method: 'POST', url: '/api/attack/deauth', payload: { apIndex: 3 } })
        expect(res.statusCode).toBe(400)
        expect(res.json()).toMatchObject({ ok: false, code: 'INVALID_ARGUMENT', error: 'Invalid AP index: 3' })
        expect(factory.last().writes).toEqual([])
    })

    it('sends BLE spam for a known target', async () => {
        await connect()
        const res = await app.inject({ method: 'POST', url: '/api/attack/blespam', payload: { target: 'apple' } })
        expect(res.json()).toMatchObject({ ok: true, link: { currentScan: 'ble_spam_apple' } })
        expect(factory.last().writes).toEqual(['blespam -t apple\n'])
    })

    it('passes terminal commands through', async () => {
        await connect()
        const res = await app.inject({ method: 'POST', url: '/api/serial/command', payload: { command: 'help' } })
        expect(res.json()).toMatchObject({ ok: true, link: { currentScan: null } })
        expect(factory.last().writes).toEqual(['help\n'])
    })

    it('clears results', async () => {
        await connect()
        factory.last().feed('-73 Device: 63:C6:BB:7B:D1:1C\n')
        await vi.waitFor(() => expect(app.marauderEngine.getSnapshot().bleDevices).toHaveLength(1))

        const res = await app.inject({ method: 'POST', url: '/api/results/clear' })
        expect(res.json()).toEqual({ ok: true })
        expect(app.marauderEngine.getSnapshot().bleDevices).toEqual([])
    })
})

describe('session routes', () => {
    it('records, lists and exports a session', async () => {
        await connect()

        const started = await app.inject({ method: 'POST', url: '/api/sessions/start' })
        const { session } = started.json<{ session: string }>()
        expect(session).toMatch(/^\d{4}-\d{2}-\d{2}_\d{6}\.jsonl$/)

        factory.last().feed('-42 ESSID: Lab Ch: 6 BSSID: AA:BB:CC:DD:EE:FF\n')
        await vi.waitFor(() => expect(app.marauderEngine.getSnapshot().accessPoints).toHaveLength(1))

        const stopped = await app.inject({ method: 'POST', url: '/api/sessions/stop' })
        expect(stopped.json()).toEqual({ ok: true, session })

        const listed = await app.inject({ method: 'GET', url: '/api/sessions' })
        expect(listed.json()).toEqual({ recording: false, sessions: [session] })

        const exported = await app.inject({ method: 'POST', url: '/api/sessions/export', payload: { name: session } })
        expect(exported.statusCode).toBe(200)
        const body = exported.json<{ ok: boolean; csvFile: string; csv: string }>()
        expect(body.csvFile).toBe(session.replace(/\.jsonl$/, '.csv'))
        expect(body.csv.split('\n')[0]).toBe('timestamp,eventType,bssid,channel,rssi,ssid')
    })

    it('answers 404 for an unknown session', async () => {
        const res = await app.inject({ method: 'POST', url: '/api/sessions/export', payload: { name: 'nope' } })
        expect(res.statusCode).toBe(404)
        expect(res.json()).toEqual({ ok: false, error: 'session not found: nope.jsonl' })
    })
})

describe('shutdown', () => {
    it('closes the serial link with the app', async () => {
        await connect()
        const port = factory.last()
        await app.close()
        closed = true
        expect(port.isOpen).toBe(false)
    })
})
