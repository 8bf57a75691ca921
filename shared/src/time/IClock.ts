/**
 * Time source for the LLM call governor, retry backoff and cache timestamps.
 *
 * Waiting goes through the clock too, so a fake clock can stand in for both reading the
 * time and sleeping: rate-limit windows and backoff schedules then run instantly in tests.
 */
import { setTimeout as sleepTimer } from 'node:timers/promises'

export interface IClock {
    /** Milliseconds since epoch */
    nowMs(): number

    nowIso(): string

    /** Resolve after `ms` (immediately for `ms <= 0`) */
    sleep(ms: number): Promise<void>
}

export class SystemClock implements IClock {
    nowMs(): number {
        return Date.now()
    }

    nowIso(): string {
        return new Date().toISOString()
    }

    async sleep(ms: number): Promise<void> {
        if (ms > 0) await sleepTimer(ms)
    }
}

/**
 * Clock that only moves when something sleeps on it (or `advance` is called).
 * Every requested wait is kept in `waits`, in call order.
 */
export class FakeClock implements IClock {
    readonly waits: number[] = []
    private currentMs: number

    constructor(initialTime: Date = new Date('2025-01-01T00:00:00.000Z')) {
        this.currentMs = initialTime.getTime()
    }

    nowMs(): number {
        return this.currentMs
    }

    nowIso(): string {
        return new Date(this.currentMs).toISOString()
    }

    async sleep(ms: number): Promise<void> {
        this.waits.push(ms)
        this.advance(ms)
        // yield once so queued work interleaves as it would with a real timer
        await Promise.resolve()
    }

    advance(ms: number): void {
        this.currentMs += Math.max(0, ms)
    }
}
