// services/bridge/src/core/engine/types.ts

import type { AccessPoint, BleDevice, LinkPhase, Station } from '../../devices/marauder/types.js'
import type { LinkErrorCode } from '../errors.js'
import type { ActivityLogEntry } from './activityLog.js'

/** The slice of the link service the engine drives. */
export interface CommandLink {
    connect(port?: string): Promise<void>
    disconnect(): Promise<void>
    send(command: string): Promise<void>
    isConnected(): boolean
    getPort(): string | null
    getPhase(): LinkPhase
}

export const BLE_SPAM_TARGETS = ['apple', 'samsung', 'google', 'windows', 'flipper', 'all'] as const
export type BleSpamTarget = (typeof BLE_SPAM_TARGETS)[number]

export function isBleSpamTarget(value: string): value is BleSpamTarget {
    return BLE_SPAM_TARGETS.some((t) => t === value)
}

/** Scan or attack in progress, as last requested or reported. */
export type CurrentScan =
    | 'wifi_ap'
    | 'wifi_sta'
    | 'ble'
    | 'attack_deauth'
    | 'attack_beacon'
    | 'attack_rickroll'
    | `ble_spam_${BleSpamTarget}`
    | 'wifi'
    | 'bluetooth'
    | 'ap'
    | 'station'

export interface LinkState {
    port: string | null
    connected: boolean
    currentScan: CurrentScan | null
}

export type ActivityCategory = 'WiFi' | 'BLE' | 'System'

/* -------------------------------------------------------------------------- */
/*  Observer notifications                                                    */
/* -------------------------------------------------------------------------- */

export interface UpdateNotification {
    readonly kind: 'update'
    readonly payload: LinkState
}

export interface ActivityNotification {
    readonly kind: 'activity'
    readonly payload: { category: ActivityCategory; message: string }
}

export interface RawLineNotification {
    readonly kind: 'raw-line'
    readonly payload: { text: string }
}

export type EngineNotification = UpdateNotification | ActivityNotification | RawLineNotification

/* -------------------------------------------------------------------------- */
/*  Snapshot + export                                                         */
/* -------------------------------------------------------------------------- */

export interface EngineSnapshot {
    link: LinkState & {
        phase: LinkPhase
        recording: boolean
        sessionPath: string | null
    }
    accessPoints: AccessPoint[]
    stations: Station[]
    bleDevices: BleDevice[]
    activity: ActivityLogEntry[]
}

export type ExportResult =
    | { ok: true; sessionPath: string; csvPath: string; csv: string }
    | { ok: false; sessionPath: string; error: string }

export type ConnectResult =
    | { ok: true; port: string | null }
    | { ok: false; error: string; code: LinkErrorCode | null }
