// services/bridge/src/devices/marauder/MarauderLinkService.ts

import { SerialPort } from 'serialport'
import { ReadlineParser } from '@serialport/parser-readline'
import type { ChannelLogger } from '@marauder-link/logging'
import { ConnectError, NotConnectedError, describeError } from '../../core/errors.js'
import { Mutex } from '../../core/serial/lock.js'
import { isBlankLine, parseLine, stripPromptNoise } from './parser.js'
import { resolvePort } from './portResolver.js'
import type {
    LinkPhase,
    LinkPort,
    LinkPortFactory,
    MarauderEventSink,
    MarauderLinkConfig,
    PortLister,
} from './types.js'
import { DEFAULT_LINK_CONFIG, sleep, withTimeout } from './utils.js'

export interface MarauderLinkServiceDeps {
    events: MarauderEventSink
    log: ChannelLogger
    /** Defaults to a real SerialPort with autoOpen disabled. */
    createPort?: LinkPortFactory
    listPorts?: PortLister
    platform?: NodeJS.Platform
}

const defaultPortFactory: LinkPortFactory = ({ path, baudRate }) =>
    new SerialPort({
        path,
        baudRate,
        autoOpen: false,
        dataBits: 8,
        parity: 'none',
        stopBits: 1,
    })

/**
 * Owns the serial handle to a Marauder board.
 *
 * Lines read from the device are cleaned, kept in a raw history, parsed and
 * published as MarauderEvents. Once connect() has succeeded the service keeps
 * the link up on its own: an I/O error or unplug publishes `disconnected`
 * and a timer retries every reconnectDelayMs until the board is back or
 * disconnect() is called.
 */
export class MarauderLinkService {
    private readonly config: MarauderLinkConfig
    private readonly deps: MarauderLinkServiceDeps
    private readonly createPort: LinkPortFactory

    private phase: LinkPhase = 'disconnected'
    private port: LinkPort | null = null
    private portPath: string | null = null

    /** What the caller asked for; null means rediscover on every reconnect. */
    private explicitPort: string | null = null
    private running = false
    private connecting = false
    // Bumped on every connect/disconnect so a reconnect attempt started for
    // an older session never attaches its handle.
    private generation = 0

    private reconnectAttempts = 0
    private reconnectTimer: NodeJS.Timeout | null = null

    private readonly writeLock = new Mutex()
    private rawHistory: string[] = []

    constructor(config: Partial<MarauderLinkConfig>, deps: MarauderLinkServiceDeps) {
        this.config = { ...DEFAULT_LINK_CONFIG, ...config }
        this.deps = deps
        this.createPort = deps.createPort ?? defaultPortFactory
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    async connect(port?: string): Promise<void> {
        if (this.running || this.connecting) {
            this.deps.log.warn('connect() ignored: link already open; disconnect first', {
                port: this.portPath,
            })
            return
        }

        this.connecting = true
        const requested = this.generation
        try {
            const explicit = port?.trim() || this.config.portPath.trim() || null
            const path = await this.resolve(explicit)

            this.deps.log.info(`opening ${path} @ ${this.config.baudRate} baud`)
            const handle = await this.openPort(path)

            if (requested !== this.generation) {
                // disconnect() landed while the port was opening
                this.deps.log.info(`connect to ${path} cancelled by disconnect()`)
                await this.closeHandle(handle)
                return
            }

            this.explicitPort = explicit
            this.running = true
            this.generation += 1
            const attached = this.generation
            this.attach(handle, path)
            await this.pulseReset(handle)

            if (attached !== this.generation) return
            this.deps.log.info(`connected to ${path}`)
        } finally {
            this.connecting = false
        }
    }

    async disconnect(): Promise<void> {
        const wasRunning = this.running
        this.running = false
        this.generation += 1
        this.clearReconnectTimer()

        const port = this.port
        this.port = null
        this.phase = 'disconnected'
        this.reconnectAttempts = 0

        if (port) {
            await this.closeHandle(port)
        }
        if (wasRunning) {
            this.deps.log.info('link closed', { port: this.portPath })
        }
    }

    isConnected(): boolean {
        return this.running && this.port !== null && this.port.isOpen
    }

    /**
     * Write one command line. Rejects with NotConnectedError straight away
     * when no handle is open; commands are never queued for a later reconnect.
     */
    async send(command: string): Promise<void> {
        if (!this.port || !this.port.isOpen) {
            throw new NotConnectedError()
        }

        const payload = command.endsWith('\n') ? command : `${command}\n`

        await this.writeLock.runExclusive(async () => {
            const port = this.port
            if (!port || !port.isOpen) throw new NotConnectedError()

            await new Promise<void>((resolve, reject) => {
                port.write(payload, (err) => (err ? reject(err) : resolve()))
            })
            await new Promise<void>((resolve, reject) => {
                port.drain((err) => (err ? reject(err) : resolve()))
            })
        })

        this.deps.log.debug(`TX >>> ${command.trimEnd()}`)
    }

    getPort(): string | null {
        return this.portPath
    }

    getPhase(): LinkPhase {
        return this.phase
    }

    /** Most recent raw lines, oldest first. */
    getRawHistory(n?: number): string[] {
        if (n === undefined) return [...this.rawHistory]
        if (n <= 0) return []
        return this.rawHistory.slice(-n)
    }

    /* ---------------------------------------------------------------------- */
    /*  SerialPort wiring                                                     */
    /* ---------------------------------------------------------------------- */

    private resolve(explicit: string | null): Promise<string> {
        return resolvePort(explicit, {
            platform: this.deps.platform,
            listPorts: this.deps.listPorts,
        })
    }

    private async openPort(path: string): Promise<LinkPort> {
        try {
            const port = this.createPort({ path, baudRate: this.config.baudRate })
            await new Promise<void>((resolve, reject) => {
                port.open((err) => (err ? reject(err) : resolve()))
            })
            return port
        } catch (err) {
            throw ConnectError.openFailed(path, err)
        }
    }

    private attach(port: LinkPort, path: string): void {
        this.port = port
        this.portPath = path
        this.phase = 'connected'
        this.reconnectAttempts = 0

        const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }))
        parser.on('data', (chunk: string | Buffer) => {
            if (this.port !== port) return
            this.handleLine(chunk.toString())
        })

        port.on('error', (err) => {
            void this.handleIoFailure(port, err.message)
        })
        port.on('close', (err) => {
            void this.handleIoFailure(port, err ? err.message : 'port closed')
        })
    }

    /**
     * Pulse RTS with DTR released. On ESP32 dev boards this drives EN low and
     * restarts the firmware into its CLI.
     */
    private async pulseReset(port: LinkPort): Promise<void> {
        if (this.config.resetPulseMs <= 0) return
        try {
            await this.setControlLines(port, { dtr: false, rts: true })
            await sleep(this.config.resetPulseMs)
            await this.setControlLines(port, { dtr: false, rts: false })
        } catch (err) {
            this.deps.log.warn(`reset pulse failed: ${describeError(err)}`)
        }
    }

    private setControlLines(port: LinkPort, lines: { dtr: boolean; rts: boolean }): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            port.set(lines, (err) => (err ? reject(err) : resolve()))
        })
    }

    private async closeHandle(port: LinkPort): Promise<void> {
        if (!port.isOpen) return

        const closed = new Promise<boolean>((resolve) => {
            port.close((err) => {
                if (err) this.deps.log.debug(`close reported: ${err.message}`)
                resolve(true)
            })
        })

        const finished = await withTimeout(closed, this.config.closeTimeoutMs, false)
        if (!finished) {
            this.deps.log.warn(`port did not close within ${this.config.closeTimeoutMs}ms`)
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Reader                                                                */
    /* ---------------------------------------------------------------------- */

    private handleLine(rawLine: string): void {
        const line = stripPromptNoise(rawLine)

        this.rawHistory.push(line)
        if (this.rawHistory.length > this.config.rawHistorySize) {
            this.rawHistory.splice(0, this.rawHistory.length - this.config.rawHistorySize)
        }

        if (isBlankLine(line)) return
        this.deps.log.debug(`RX <<< ${line}`)
        this.deps.events.publish(parseLine(line))
    }

    /* ---------------------------------------------------------------------- */
    /*  Error + reconnect handling                                            */
    /* ---------------------------------------------------------------------- */

    private async handleIoFailure(port: LinkPort, reason: string): Promise<void> {
        // 'error' and 'close' often both fire for one unplug; only the first counts.
        if (this.port !== port) return
        this.port = null

        if (!this.running) {
            this.phase = 'disconnected'
            return
        }

        const generation = this.generation
        this.deps.log.warn(`serial link lost: ${reason}`, { port: this.portPath })
        this.phase = 'reconnecting'
        await this.closeHandle(port)

        // disconnect(), and maybe a fresh connect(), ran while the handle closed
        if (!this.running || generation !== this.generation) return

        this.deps.events.publish(Object.freeze({ kind: 'disconnected', reason }))
        this.scheduleReconnect()
    }

    private scheduleReconnect(): void {
        this.clearReconnectTimer()
        if (!this.running) return

        const generation = this.generation
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null
            void this.tryReconnect(generation)
        }, this.config.reconnectDelayMs)
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer)
            this.reconnectTimer = null
        }
    }

    private async tryReconnect(generation: number): Promise<void> {
        if (!this.running || generation !== this.generation) return
        this.reconnectAttempts += 1

        let opened: { handle: LinkPort; path: string }
        try {
            const path = await this.resolve(this.explicitPort)
            opened = { handle: await this.openPort(path), path }
        } catch (err) {
            this.deps.log.debug(`reconnect attempt ${this.reconnectAttempts} failed: ${describeError(err)}`)
            if (generation === this.generation) this.scheduleReconnect()
            return
        }

        if (!this.running || generation !== this.generation) {
            // disconnect() landed while the open was in flight
            await this.closeHandle(opened.handle)
            return
        }

        const attempts = this.reconnectAttempts
        this.attach(opened.handle, opened.path)
        this.deps.log.info(`reconnected to ${opened.path} after ${attempts} attempt(s)`)
    }
}
