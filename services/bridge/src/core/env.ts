// services/bridge/src/core/env.ts
/* -------------------------------------------------------------------------- */
/*  Env → config helpers                                                      */
/* -------------------------------------------------------------------------- */

export type Env = Record<string, string | undefined>

export function readIntEnv(env: Env, name: string, fallback: number): number {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') return fallback
    const n = Number(raw)
    return Number.isFinite(n) ? Math.trunc(n) : fallback
}

export function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
    const raw = env[name]
    if (!raw) return fallback
    const v = raw.trim().toLowerCase()
    if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true
    if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false
    return fallback
}

export function readStringEnv(env: Env, name: string): string | undefined {
    const raw = env[name]
    if (raw === undefined) return undefined
    const v = raw.trim()
    return v === '' ? undefined : v
}
