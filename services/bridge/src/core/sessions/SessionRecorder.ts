// services/bridge/src/core/sessions/SessionRecorder.ts

import { closeSync, existsSync, mkdirSync, openSync, readdirSync, readFileSync, writeFileSync, writeSync } from 'node:fs'
import { basename, join, parse } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { MarauderEvent } from '../../devices/marauder/types.js'

/* -------------------------------------------------------------------------- */
/*  Record shape                                                              */
/* -------------------------------------------------------------------------- */

export type SessionFieldValue = string | number

/** One NDJSON line in a session file. */
export interface SessionRecord {
    timestamp: string
    eventType: string
    [field: string]: SessionFieldValue
}

export const SESSION_EXTENSION = '.jsonl'

const LEADING_COLUMNS = ['timestamp', 'eventType'] as const

export function toSessionRecord(event: MarauderEvent, at: Date): SessionRecord {
    const { kind, ...fields } = event
    return { timestamp: at.toISOString(), eventType: kind, ...fields }
}

function pad(n: number): string {
    return String(n).padStart(2, '0')
}

/** `YYYY-MM-DD_HHMMSS` in local time. */
export function formatSessionStamp(d: Date): string {
    const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
    const time = `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
    return `${date}_${time}`
}

export function csvPathFor(sessionPath: string): string {
    const { dir, name } = parse(sessionPath)
    return join(dir, `${name}.csv`)
}

/* -------------------------------------------------------------------------- */
/*  CSV export                                                                */
/* -------------------------------------------------------------------------- */

function readRecords(sessionPath: string): Array<Record<string, unknown>> {
    const rows: Array<Record<string, unknown>> = []
    const lines = readFileSync(sessionPath, 'utf8').split('\n')

    lines.forEach((line, idx) => {
        const text = line.trim()
        if (!text) return
        const parsed: unknown = JSON.parse(text)
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            throw new Error(`${basename(sessionPath)} line ${idx + 1} is not a JSON object`)
        }
        rows.push(Object.fromEntries(Object.entries(parsed)))
    })
    return rows
}

/**
 * Convert a session file to CSV and write it beside the source.
 *
 * Columns: timestamp, eventType, then every other field name seen in the
 * file, sorted. Records lacking a column get an empty cell.
 */
export function exportCsv(sessionPath: string): string {
    const rows = readRecords(sessionPath)

    const seen = new Set<string>()
    for (const row of rows) {
        for (const key of Object.keys(row)) seen.add(key)
    }
    const leading = LEADING_COLUMNS.filter((c) => seen.has(c))
    const rest = [...seen].filter((k) => !leading.some((c) => c === k)).sort()
    const columns = [...leading, ...rest]

    const csv = stringify(rows, { header: true, columns })
    writeFileSync(csvPathFor(sessionPath), csv, 'utf8')
    return csv
}

/* -------------------------------------------------------------------------- */
/*  Recorder                                                                  */
/* -------------------------------------------------------------------------- */

export interface SessionRecorderOptions {
    sessionsDir: string
    now?: () => Date
}

/**
 * Appends events to one open NDJSON file at a time.
 * Writes are synchronous so each record is on disk before the next event is handled.
 */
export class SessionRecorder {
    private readonly sessionsDir: string
    private readonly now: () => Date

    private fd: number | null = null
    private path: string | null = null

    constructor(opts: SessionRecorderOptions) {
        this.sessionsDir = opts.sessionsDir
        this.now = opts.now ?? (() => new Date())
    }

    isRecording(): boolean {
        return this.fd !== null
    }

    currentPath(): string | null {
        return this.path
    }

    /** Opens a new session file; returns the current one if already recording. */
    start(): string {
        if (this.fd !== null && this.path !== null) return this.path

        mkdirSync(this.sessionsDir, { recursive: true })
        const path = join(this.sessionsDir, `${formatSessionStamp(this.now())}${SESSION_EXTENSION}`)
        this.fd = openSync(path, 'a')
        this.path = path
        return path
    }

    /** Returns the path of the closed session, or null when none was open. */
    stop(): string | null {
        const fd = this.fd
        const path = this.path
        this.fd = null
        this.path = null
        if (fd !== null) closeSync(fd)
        return path
    }

    record(event: MarauderEvent): void {
        if (this.fd === null) return
        writeSync(this.fd, `${JSON.stringify(toSessionRecord(event, this.now()))}\n`)
    }

    /** Full paths of recorded sessions, newest first. */
    listSessions(): string[] {
        if (!existsSync(this.sessionsDir)) return []
        return readdirSync(this.sessionsDir)
            .filter((name) => name.endsWith(SESSION_EXTENSION))
            .sort()
            .reverse()
            .map((name) => join(this.sessionsDir, name))
    }

    /**
     * Map a session name (with or without extension) to its file inside the
     * sessions directory. Directory components are dropped.
     */
    resolveSession(name: string): string {
        const file = basename(name.trim())
        const withExt = file.endsWith(SESSION_EXTENSION) ? file : `${file}${SESSION_EXTENSION}`
        return join(this.sessionsDir, withExt)
    }
}
