// services/bridge/src/devices/marauder/utils.ts

import { readIntEnv, readStringEnv, type Env } from '../../core/env.js'
import type { MarauderLinkConfig } from './types.js'

export const DEFAULT_LINK_CONFIG: MarauderLinkConfig = {
    portPath: '',
    baudRate: 115200,
    reconnectDelayMs: 3000,
    resetPulseMs: 100,
    closeTimeoutMs: 5000,
    rawHistorySize: 500,
}

/**
 * Build a MarauderLinkConfig from environment variables.
 *
 *   - MARAUDER_PORT               explicit device path (empty = auto-detect)
 *   - MARAUDER_BAUD               default 115200
 *   - MARAUDER_RECONNECT_DELAY_MS default 3000
 *   - MARAUDER_RESET_PULSE_MS     default 100 (0 disables the pulse)
 *   - MARAUDER_CLOSE_TIMEOUT_MS   default 5000
 *   - MARAUDER_RAW_HISTORY        default 500
 */
export function buildLinkConfigFromEnv(env: Env = process.env): MarauderLinkConfig {
    const d = DEFAULT_LINK_CONFIG
    const baudRate = readIntEnv(env, 'MARAUDER_BAUD', d.baudRate)
    const reconnectDelayMs = readIntEnv(env, 'MARAUDER_RECONNECT_DELAY_MS', d.reconnectDelayMs)
    const resetPulseMs = readIntEnv(env, 'MARAUDER_RESET_PULSE_MS', d.resetPulseMs)
    const closeTimeoutMs = readIntEnv(env, 'MARAUDER_CLOSE_TIMEOUT_MS', d.closeTimeoutMs)
    const rawHistorySize = readIntEnv(env, 'MARAUDER_RAW_HISTORY', d.rawHistorySize)

    return {
        portPath: readStringEnv(env, 'MARAUDER_PORT') ?? '',
        baudRate: baudRate > 0 ? baudRate : d.baudRate,
        reconnectDelayMs: reconnectDelayMs > 0 ? reconnectDelayMs : d.reconnectDelayMs,
        resetPulseMs: resetPulseMs >= 0 ? resetPulseMs : d.resetPulseMs,
        closeTimeoutMs: closeTimeoutMs > 0 ? closeTimeoutMs : d.closeTimeoutMs,
        rawHistorySize: rawHistorySize > 0 ? rawHistorySize : d.rawHistorySize,
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => setTimeout(resolve, ms))
}

/** Resolve with the promise's outcome, or with `fallback` once `ms` elapses. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, fallback: T): Promise<T> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<T>((resolve) => {
        timer = setTimeout(() => resolve(fallback), ms)
    })
    try {
        return await Promise.race([promise, timeout])
    } finally {
        clearTimeout(timer)
    }
}
