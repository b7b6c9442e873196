import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { parse } from 'csv-parse/sync'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import {
    SessionRecorder,
    csvPathFor,
    exportCsv,
    formatSessionStamp,
} from '../../src/core/sessions/SessionRecorder.js'

const AT = new Date(2024, 0, 2, 3, 4, 5)

let dir: string

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'marauder-sessions-'))
})

afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
})

function readLines(path: string): unknown[] {
    return readFileSync(path, 'utf8')
        .split('\n')
        .filter((l) => l.trim() !== '')
        .map((l): unknown => JSON.parse(l))
}

describe('formatSessionStamp', () => {
    it('formats local time as YYYY-MM-DD_HHMMSS', () => {
        expect(formatSessionStamp(new Date(2024, 10, 9, 14, 5, 7))).toBe('2024-11-09_140507')
    })
})

describe('SessionRecorder', () => {
    it('opens one timestamped file and keeps it until stopped', () => {
        const rec = new SessionRecorder({ sessionsDir: join(dir, 'nested'), now: () => AT })

        const path = rec.start()
        expect(path).toBe(join(dir, 'nested', '2024-01-02_030405.jsonl'))
        expect(rec.isRecording()).toBe(true)
        expect(rec.start()).toBe(path)

        expect(rec.stop()).toBe(path)
        expect(rec.isRecording()).toBe(false)
        expect(rec.stop()).toBeNull()
    })

    it('writes one JSON object per event with timestamp and eventType first-class', () => {
        const rec = new SessionRecorder({ sessionsDir: dir, now: () => AT })
        const path = rec.start()

        rec.record({ kind: 'ap-found', ssid: 'Lab', bssid: 'AA:BB:CC:DD:EE:FF', channel: 6, rssi: -42 })
        rec.record({ kind: 'scan-stopped' })
        rec.stop()

        expect(readLines(path)).toEqual([
            {
                timestamp: AT.toISOString(),
                eventType: 'ap-found',
                ssid: 'Lab',
                bssid: 'AA:BB:CC:DD:EE:FF',
                channel: 6,
                rssi: -42,
            },
            { timestamp: AT.toISOString(), eventType: 'scan-stopped' },
        ])
    })

    it('ignores events while not recording', () => {
        const rec = new SessionRecorder({ sessionsDir: dir, now: () => AT })
        rec.record({ kind: 'scan-stopped' })
        expect(rec.listSessions()).toEqual([])
    })

    it('lists sessions newest first and skips other files', () => {
        writeFileSync(join(dir, '2024-01-01_000000.jsonl'), '')
        writeFileSync(join(dir, '2024-03-01_000000.jsonl'), '')
        writeFileSync(join(dir, 'notes.txt'), '')

        const rec = new SessionRecorder({ sessionsDir: dir })
        expect(rec.listSessions()).toEqual([
            join(dir, '2024-03-01_000000.jsonl'),
            join(dir, '2024-01-01_000000.jsonl'),
        ])
        expect(new SessionRecorder({ sessionsDir: join(dir, 'missing') }).listSessions()).toEqual([])
    })

    it('resolves session names inside the sessions directory only', () => {
        const rec = new SessionRecorder({ sessionsDir: dir })
        expect(rec.resolveSession('2024-01-01_000000')).toBe(join(dir, '2024-01-01_000000.jsonl'))
        expect(rec.resolveSession('../../etc/passwd')).toBe(join(dir, 'passwd.jsonl'))
    })
})

describe('exportCsv', () => {
    it('orders columns timestamp, eventType, then the rest sorted, leaving gaps empty', () => {
        const rec = new SessionRecorder({ sessionsDir: dir, now: () => AT })
        const path = rec.start()
        rec.record({ kind: 'ap-found', ssid: 'Cafe, Guest', bssid: 'AA:BB:CC:DD:EE:FF', channel: 6, rssi: -42 })
        rec.record({ kind: 'station-found', mac: '11:22:33:44:55:66', rssi: -70, associatedBssid: 'AA:BB:CC:DD:EE:FF' })
        rec.stop()

        const csv = exportCsv(path)

        expect(csv.split('\n')[0]).toBe('timestamp,eventType,associatedBssid,bssid,channel,mac,rssi,ssid')
        expect(parse(csv, { columns: true })).toEqual([
            {
                timestamp: AT.toISOString(),
                eventType: 'ap-found',
                associatedBssid: '',
                bssid: 'AA:BB:CC:DD:EE:FF',
                channel: '6',
                mac: '',
                rssi: '-42',
                ssid: 'Cafe, Guest',
            },
            {
                timestamp: AT.toISOString(),
                eventType: 'station-found',
                associatedBssid: 'AA:BB:CC:DD:EE:FF',
                bssid: '',
                channel: '',
                mac: '11:22:33:44:55:66',
                rssi: '-70',
                ssid: '',
            },
        ])

        const csvPath = csvPathFor(path)
        expect(csvPath).toBe(join(dir, '2024-01-02_030405.csv'))
        expect(readFileSync(csvPath, 'utf8')).toBe(csv)
    })

    it('throws on a line that is not a JSON object', () => {
        const path = join(dir, 'bad.jsonl')
        writeFileSync(path, '{"a":1}\n[1,2]\n')
        expect(() => exportCsv(path)).toThrow('bad.jsonl line 2 is not a JSON object')
        expect(existsSync(join(dir, 'bad.csv'))).toBe(false)
    })
})
