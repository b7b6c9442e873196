// services/bridge/src/core/engine/activityLog.ts

export interface ActivityLogEntry {
    /** ms since epoch */
    timestamp: number
    message: string
}

/** Bounded log of human-readable lines; the oldest entry is evicted first. */
export class ActivityLog {
    private readonly entries: ActivityLogEntry[] = []

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`activity log capacity must be a positive integer, got ${capacity}`)
        }
    }

    push(message: string, timestamp: number = Date.now()): ActivityLogEntry {
        const entry = { timestamp, message }
        this.entries.push(entry)
        if (this.entries.length > this.capacity) this.entries.shift()
        return entry
    }

    /** Oldest first. */
    list(): ActivityLogEntry[] {
        return this.entries.map((e) => ({ ...e }))
    }

    last(): ActivityLogEntry | undefined {
        const entry = this.entries[this.entries.length - 1]
        return entry ? { ...entry } : undefined
    }

    size(): number {
        return this.entries.length
    }

    clear(): void {
        this.entries.length = 0
    }
}
