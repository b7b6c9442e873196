// services/bridge/src/core/engine/config.ts

import { homedir } from 'node:os'
import { join } from 'node:path'
import { readIntEnv, readStringEnv, type Env } from '../env.js'

export interface EngineConfig {
    sessionsDir: string
    activityLogCapacity: number
}

export const DEFAULT_ACTIVITY_LOG_CAPACITY = 200

export function defaultSessionsDir(): string {
    return join(homedir(), '.marauder-link', 'sessions')
}

/**
 * Build the engine config from environment variables.
 *
 *   - MARAUDER_SESSIONS_DIR      default ~/.marauder-link/sessions (a leading ~ expands)
 *   - MARAUDER_ACTIVITY_LOG_MAX  default 200
 */
export function buildEngineConfigFromEnv(env: Env = process.env): EngineConfig {
    const dir = readStringEnv(env, 'MARAUDER_SESSIONS_DIR')
    const capacity = readIntEnv(env, 'MARAUDER_ACTIVITY_LOG_MAX', DEFAULT_ACTIVITY_LOG_CAPACITY)

    return {
        sessionsDir: dir ? expandHome(dir) : defaultSessionsDir(),
        activityLogCapacity: capacity > 0 ? capacity : DEFAULT_ACTIVITY_LOG_CAPACITY,
    }
}

function expandHome(p: string): string {
    if (p === '~') return homedir()
    if (p.startsWith('~/')) return join(homedir(), p.slice(2))
    return p
}
