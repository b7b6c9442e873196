// services/bridge/src/core/engine/MarauderEngine.ts

import { basename } from 'node:path'
import type { ChannelLogger } from '@marauder-link/logging'
import { InvalidArgumentError, LinkError, describeError, type LinkErrorCode } from '../errors.js'
import { EventBus, type Observer, type Subscription } from '../events/EventBus.js'
import type { BusTelemetry } from '../events/telemetry.js'
import { SessionRecorder, csvPathFor, exportCsv } from '../sessions/SessionRecorder.js'
import type {
    AccessPoint,
    BleDevice,
    MarauderEvent,
    Station,
} from '../../devices/marauder/types.js'
import { ActivityLog } from './activityLog.js'
import type { EngineConfig } from './config.js'
import {
    isBleSpamTarget,
    type ActivityCategory,
    type ActivityNotification,
    type CommandLink,
    type ConnectResult,
    type CurrentScan,
    type EngineNotification,
    type EngineSnapshot,
    type ExportResult,
    type LinkState,
} from './types.js'

export interface MarauderEngineDeps {
    link: CommandLink
    bus: Pick<EventBus<MarauderEvent>, 'subscribe'>
    log: ChannelLogger
    /** Session start/stop/export lines; falls back to `log`. */
    sessionLog?: ChannelLogger
    /** Built from config.sessionsDir when omitted. */
    recorder?: SessionRecorder
    now?: () => Date
    /** Telemetry for the engine's own observer registry. */
    telemetry?: BusTelemetry
}

/**
 * Keyed collection that keeps first-seen order and replaces values in place.
 * Entries with an empty key are never merged.
 */
class DedupList<T> {
    private items: T[] = []
    private readonly index = new Map<string, number>()

    upsert(key: string, value: T): void {
        if (!key) {
            this.items.push(value)
            return
        }
        const at = this.index.get(key)
        if (at === undefined) {
            this.index.set(key, this.items.length)
            this.items.push(value)
        } else {
            this.items[at] = value
        }
    }

    at(i: number): T | undefined {
        return this.items[i]
    }

    get length(): number {
        return this.items.length
    }

    toArray(): T[] {
        return [...this.items]
    }

    clear(): void {
        this.items = []
        this.index.clear()
    }
}

/**
 * Aggregates MarauderEvents into deduplicated collections, keeps the activity
 * log and link state, records sessions and issues device commands.
 *
 * Observers get `{ kind, payload }` notifications after each event has been
 * fully applied (collections, activity log, session file).
 */
export class MarauderEngine {
    private readonly deps: MarauderEngineDeps
    private readonly recorder: SessionRecorder
    private readonly now: () => Date
    private readonly sessionLog: ChannelLogger
    private readonly activity: ActivityLog
    private readonly observers: EventBus<EngineNotification>

    private readonly accessPoints = new DedupList<AccessPoint>()
    private readonly stations = new DedupList<Station>()
    private readonly bleDevices = new DedupList<BleDevice>()

    private state: LinkState = { port: null, connected: false, currentScan: null }
    private failureCode: LinkErrorCode | null = null
    private subscription: Subscription | null = null

    constructor(config: EngineConfig, deps: MarauderEngineDeps) {
        this.deps = deps
        this.now = deps.now ?? (() => new Date())
        this.sessionLog = deps.sessionLog ?? deps.log
        this.recorder = deps.recorder ?? new SessionRecorder({ sessionsDir: config.sessionsDir, now: this.now })
        this.activity = new ActivityLog(config.activityLogCapacity)
        this.observers = new EventBus<EngineNotification>({ telemetry: deps.telemetry })
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    start(): void {
        if (this.subscription) return
        this.subscription = this.deps.bus.subscribe((event) => this.handleEvent(event), {
            name: 'marauder-engine',
        })
    }

    stop(): void {
        this.subscription?.unsubscribe()
        this.subscription = null
        this.stopSession()
    }

    subscribe(observer: Observer<EngineNotification>, name?: string): Subscription {
        return this.observers.subscribe(observer, { name })
    }

    /* ---------------------------------------------------------------------- */
    /*  Event handling                                                        */
    /* ---------------------------------------------------------------------- */

    handleEvent(event: MarauderEvent): void {
        let activity: ActivityNotification | null = null

        switch (event.kind) {
            case 'ap-found': {
                const { kind: _kind, ...ap } = event
                this.accessPoints.upsert(ap.bssid, ap)
                activity = this.appendActivity(`Found AP: ${ap.ssid} ch${ap.channel} ${ap.rssi}dBm`, 'WiFi')
                break
            }
            case 'station-found': {
                const { kind: _kind, ...sta } = event
                this.stations.upsert(sta.mac, sta)
                activity = this.appendActivity(
                    `Station: ${sta.mac} ${sta.rssi}dBm -> ${sta.associatedBssid}`,
                    'WiFi'
                )
                break
            }
            case 'ble-device-found': {
                const { kind: _kind, ...dev } = event
                this.bleDevices.upsert(dev.mac, dev)
                activity = this.appendActivity(`Device: ${dev.name || dev.mac} ${dev.rssi}dBm`, 'BLE')
                break
            }
            case 'scan-started':
                this.state.currentScan = event.scanType
                activity = this.appendActivity(`Scan started: ${event.scanType}`)
                break
            case 'scan-stopped': {
                const was = this.state.currentScan ?? 'idle'
                this.state.currentScan = null
                activity = this.appendActivity(`Scan stopped (was: ${was})`)
                break
            }
            case 'disconnected':
                this.state.connected = false
                this.state.currentScan = null
                activity = this.appendActivity(`Device disconnected: ${event.reason}`)
                break
            case 'raw-line':
                break
        }

        if (event.kind !== 'disconnected') {
            this.refreshLinkState()
        }

        this.recordEvent(event)

        if (event.kind === 'raw-line') {
            this.notify({ kind: 'raw-line', payload: { text: event.text } })
            return
        }
        if (activity) this.notify(activity)
        this.notifyUpdate()
    }

    private recordEvent(event: MarauderEvent): void {
        if (!this.recorder.isRecording()) return
        try {
            this.recorder.record(event)
        } catch (err) {
            const path = this.recorder.stop()
            const name = path ? basename(path) : 'session'
            this.sessionLog.error(`session write failed, recording stopped: ${describeError(err)}`, { path })
            this.notify(this.appendActivity(`Session recording stopped (${name}): ${describeError(err)}`))
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Commands                                                              */
    /* ---------------------------------------------------------------------- */

    startWifiScan(): Promise<boolean> {
        return this.runCommands(['scanap'], 'wifi_ap', 'WiFi AP scan requested')
    }

    startStationScan(): Promise<boolean> {
        return this.runCommands(['scansta'], 'wifi_sta', 'Station scan requested')
    }

    startBleScan(): Promise<boolean> {
        return this.runCommands(['sniffbt'], 'ble', 'BLE scan requested')
    }

    stopScan(): Promise<boolean> {
        return this.runCommands(['stopscan'], null, 'Stop requested')
    }

    async attackDeauth(apIndex: number): Promise<boolean> {
        const ap = Number.isInteger(apIndex) ? this.accessPoints.at(apIndex) : undefined
        if (!ap) {
            this.rejectArgument(
                new InvalidArgumentError(`Invalid AP index: ${apIndex}`, {
                    apIndex,
                    known: this.accessPoints.length,
                })
            )
            return false
        }
        return this.runCommands(
            [`select -a ${apIndex}`, 'attack -t deauth'],
            'attack_deauth',
            `Deauth attack on AP ${ap.ssid} (${ap.bssid})`
        )
    }

    attackBeaconFlood(): Promise<boolean> {
        return this.runCommands(['attack -t beacon -r'], 'attack_beacon', 'Beacon flood attack started')
    }

    attackRickroll(): Promise<boolean> {
        return this.runCommands(['attack -t rickroll'], 'attack_rickroll', 'Rickroll beacon attack started')
    }

    async bleSpam(target: string): Promise<boolean> {
        if (!isBleSpamTarget(target)) {
            this.rejectArgument(new InvalidArgumentError(`Invalid BLE spam target: ${target}`, { target }))
            return false
        }
        return this.runCommands(
            [`blespam -t ${target}`],
            `ble_spam_${target}`,
            `BLE spam started (target=${target})`
        )
    }

    /** Terminal passthrough; does not touch currentScan. */
    async sendRaw(command: string): Promise<boolean> {
        const cmd = command.trim()
        if (!cmd) {
            this.rejectArgument(new InvalidArgumentError('Empty command'))
            return false
        }
        return this.runCommands([cmd], undefined, `> ${cmd}`)
    }

    /**
     * Send each command in order. currentScan changes only once every write
     * has succeeded; `undefined` leaves it alone.
     */
    private async runCommands(
        commands: string[],
        scan: CurrentScan | null | undefined,
        message: string
    ): Promise<boolean> {
        try {
            for (const cmd of commands) {
                await this.deps.link.send(cmd)
            }
        } catch (err) {
            this.failureCode = err instanceof LinkError ? err.code : null
            this.deps.log.warn(`command failed: ${commands.join('; ')}`, { err: describeError(err) })
            this.notify(this.appendActivity(`Command failed (${commands.join('; ')}): ${describeError(err)}`))
            this.notifyUpdate()
            return false
        }

        this.failureCode = null
        if (scan !== undefined) this.state.currentScan = scan
        this.deps.log.info(message)
        this.notify(this.appendActivity(message))
        this.notifyUpdate()
        return true
    }

    private rejectArgument(err: InvalidArgumentError): void {
        this.failureCode = err.code
        this.deps.log.warn(err.message, err.context)
        this.notify(this.appendActivity(err.message))
        this.notifyUpdate()
    }

    /* ---------------------------------------------------------------------- */
    /*  Link                                                                  */
    /* ---------------------------------------------------------------------- */

    async connect(port?: string): Promise<ConnectResult> {
        try {
            await this.deps.link.connect(port)
        } catch (err) {
            return this.connectFailed(describeError(err), err instanceof LinkError ? err.code : null)
        }

        this.refreshLinkState()
        if (!this.state.connected) {
            // connect() on the link is a no-op while it is reconnecting or was cancelled by disconnect()
            return this.connectFailed(`Serial link is ${this.deps.link.getPhase()}`, 'NOT_CONNECTED')
        }
        this.notify(this.appendActivity(`Connected to ${this.state.port ?? 'device'}`))
        this.notifyUpdate()
        return { ok: true, port: this.state.port }
    }

    private connectFailed(error: string, code: LinkErrorCode | null): ConnectResult {
        this.refreshLinkState()
        this.deps.log.error(`connect failed: ${error}`)
        this.notify(this.appendActivity(`Connection failed: ${error}`))
        this.notifyUpdate()
        return { ok: false, error, code }
    }

    async disconnect(): Promise<void> {
        await this.deps.link.disconnect()
        this.state.connected = false
        this.state.currentScan = null
        this.notify(this.appendActivity('Disconnected'))
        this.notifyUpdate()
    }

    private refreshLinkState(): void {
        this.state.connected = this.deps.link.isConnected()
        this.state.port = this.deps.link.getPort()
    }

    /* ---------------------------------------------------------------------- */
    /*  Results + sessions                                                    */
    /* ---------------------------------------------------------------------- */

    clearResults(): void {
        this.accessPoints.clear()
        this.stations.clear()
        this.bleDevices.clear()
        this.notify(this.appendActivity('Results cleared'))
        this.notifyUpdate()
    }

    startSession(): string {
        const wasRecording = this.recorder.isRecording()
        const path = this.recorder.start()
        if (!wasRecording) {
            this.sessionLog.info(`session recording to ${path}`)
            this.notify(this.appendActivity(`Session recording started: ${basename(path)}`))
            this.notifyUpdate()
        }
        return path
    }

    stopSession(): string | null {
        const path = this.recorder.stop()
        if (path) {
            this.sessionLog.info(`session closed ${path}`)
            this.notify(this.appendActivity(`Session recording stopped: ${basename(path)}`))
            this.notifyUpdate()
        }
        return path
    }

    isRecording(): boolean {
        return this.recorder.isRecording()
    }

    listSessions(): string[] {
        return this.recorder.listSessions()
    }

    /** Session file for a bare name, confined to the sessions directory. */
    sessionPathFor(name: string): string {
        return this.recorder.resolveSession(name)
    }

    /** Never throws; failures come back as `{ ok: false, error }`. */
    exportSession(sessionPath: string): ExportResult {
        try {
            const csv = exportCsv(sessionPath)
            const csvPath = csvPathFor(sessionPath)
            this.notify(this.appendActivity(`Exported ${basename(csvPath)}`))
            return { ok: true, sessionPath, csvPath, csv }
        } catch (err) {
            const error = `Export failed: ${describeError(err)}`
            this.sessionLog.warn(error, { sessionPath })
            this.notify(this.appendActivity(error))
            return { ok: false, sessionPath, error }
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Snapshot                                                              */
    /* ---------------------------------------------------------------------- */

    /** Most recent activity line, e.g. the reason a command returned false. */
    lastActivity(): string | null {
        return this.activity.last()?.message ?? null
    }

    /** Why the last command returned false; null after a success or a non-link failure. */
    lastFailureCode(): LinkErrorCode | null {
        return this.failureCode
    }

    getLinkState(): LinkState {
        return { ...this.state }
    }

    getSnapshot(): EngineSnapshot {
        return {
            link: {
                ...this.state,
                phase: this.deps.link.getPhase(),
                recording: this.recorder.isRecording(),
                sessionPath: this.recorder.currentPath(),
            },
            accessPoints: this.accessPoints.toArray(),
            stations: this.stations.toArray(),
            bleDevices: this.bleDevices.toArray(),
            activity: this.activity.list(),
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Helpers                                                               */
    /* ---------------------------------------------------------------------- */

    private appendActivity(message: string, category: ActivityCategory = 'System'): ActivityNotification {
        this.activity.push(message, this.now().getTime())
        return { kind: 'activity', payload: { category, message } }
    }

    private notifyUpdate(): void {
        this.notify({ kind: 'update', payload: this.getLinkState() })
    }

    private notify(notification: EngineNotification): void {
        this.observers.publish(notification)
    }
}
