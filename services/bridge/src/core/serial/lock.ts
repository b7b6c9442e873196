// services/bridge/src/core/serial/lock.ts

/**
 * FIFO async mutex. Used to keep command writes on the serial handle from
 * interleaving when several callers send at once.
 */
export class Mutex {
    private locked = false
    private readonly waiters: Array<(release: () => void) => void> = []

    isLocked(): boolean {
        return this.locked
    }

    async acquire(): Promise<() => void> {
        if (!this.locked) {
            this.locked = true
            return () => this.release()
        }

        return await new Promise<() => void>((resolve) => {
            this.waiters.push(resolve)
        })
    }

    private release(): void {
        const next = this.waiters.shift()
        if (next) {
            // still locked, ownership moves to the next waiter
            next(() => this.release())
            return
        }
        this.locked = false
    }

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire()
        try {
            return await fn()
        } finally {
            release()
        }
    }
}
