// services/bridge/src/devices/marauder/types.ts

/* -------------------------------------------------------------------------- */
/*  Discovered entities                                                       */
/* -------------------------------------------------------------------------- */

export interface AccessPoint {
    readonly ssid: string
    /** Uppercase, colon-separated. Identity key. */
    readonly bssid: string
    readonly channel: number
    /** dBm, negative */
    readonly rssi: number
}

export interface Station {
    /** Identity key. */
    readonly mac: string
    readonly rssi: number
    readonly associatedBssid: string
}

export interface BleDevice {
    /** May be empty when the device only reported an address. */
    readonly name: string
    /** May be empty when the device only reported a vendor tag; such entries are never deduplicated. */
    readonly mac: string
    readonly rssi: number
}

/* -------------------------------------------------------------------------- */
/*  Event union                                                               */
/* -------------------------------------------------------------------------- */

export type MarauderEventKind =
    | 'ap-found'
    | 'station-found'
    | 'ble-device-found'
    | 'scan-started'
    | 'scan-stopped'
    | 'disconnected'
    | 'raw-line'

export type ApFoundEvent = { readonly kind: 'ap-found' } & AccessPoint
export type StationFoundEvent = { readonly kind: 'station-found' } & Station
export type BleDeviceFoundEvent = { readonly kind: 'ble-device-found' } & BleDevice

export interface ScanStartedEvent {
    readonly kind: 'scan-started'
    readonly scanType: ScanType
}

export interface ScanStoppedEvent {
    readonly kind: 'scan-stopped'
}

export interface DisconnectedEvent {
    readonly kind: 'disconnected'
    readonly reason: string
}

export interface RawLineEvent {
    readonly kind: 'raw-line'
    readonly text: string
}

export type MarauderEvent =
    | ApFoundEvent
    | StationFoundEvent
    | BleDeviceFoundEvent
    | ScanStartedEvent
    | ScanStoppedEvent
    | DisconnectedEvent
    | RawLineEvent

export type ScanType = 'wifi' | 'bluetooth' | 'ap' | 'station'

/**
 * How the link service hands events to the rest of the app.
 * The EventBus is the production implementation.
 */
export interface MarauderEventSink {
    publish(event: MarauderEvent): void
}

/* -------------------------------------------------------------------------- */
/*  Link configuration + state                                                */
/* -------------------------------------------------------------------------- */

export interface MarauderLinkConfig {
    /** Explicit device path; empty means auto-detect. */
    portPath: string
    /** Marauder firmware talks 115200 8N1. */
    baudRate: number
    /** Fixed wait between reconnect attempts. */
    reconnectDelayMs: number
    /** How long RTS is held during the reset pulse; 0 skips the pulse. */
    resetPulseMs: number
    /** Upper bound on waiting for the handle to close on disconnect(). */
    closeTimeoutMs: number
    /** Raw received lines kept for the serial terminal view. */
    rawHistorySize: number
}

export type LinkPhase = 'disconnected' | 'connected' | 'reconnecting'

/* -------------------------------------------------------------------------- */
/*  Serial handle seam                                                        */
/* -------------------------------------------------------------------------- */

type ErrorCallback = (err: Error | null) => void

/**
 * The subset of serialport's SerialPort the link relies on.
 * Tests hand in a fake; production uses `new SerialPort({ autoOpen: false })`.
 */
export interface LinkPort {
    readonly isOpen: boolean
    open(callback: ErrorCallback): void
    close(callback: ErrorCallback): void
    write(data: string, callback: (err: Error | null | undefined) => void): boolean
    drain(callback: ErrorCallback): void
    set(options: { dtr?: boolean; rts?: boolean }, callback: ErrorCallback): void
    pipe<T extends NodeJS.WritableStream>(destination: T): T
    on(event: 'error', listener: (err: Error) => void): unknown
    on(event: 'close', listener: (err?: Error | null) => void): unknown
}

export type LinkPortFactory = (options: { path: string; baudRate: number }) => LinkPort

export interface SerialPortInfoLike {
    path: string
}

export type PortLister = () => Promise<SerialPortInfoLike[]>
