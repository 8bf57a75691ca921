/**
 * Process-wide admission control for outbound LLM calls.
 *
 * - At most `maxConcurrent` calls in flight (FIFO queue beyond that)
 * - At most `maxRequestsPerWindow` call starts per sliding window
 * - `pauseFor` holds every admission after a provider rate-limit signal
 *
 * Callers over the limit wait; nothing is rejected.
 */
import type { IClock } from '@specmap/shared'
import type { TelemetryService } from '../telemetry/TelemetryService.js'

export interface LlmCallGovernorOptions {
    maxConcurrent: number
    maxRequestsPerWindow: number
    /** Default 60s */
    windowMs?: number
}

export class LlmCallGovernor {
    private readonly maxConcurrent: number
    private readonly maxRequestsPerWindow: number
    private readonly windowMs: number
    private active = 0
    private readonly waiters: Array<() => void> = []
    private readonly startTimes: number[] = []
    private pausedUntilMs = 0

    constructor(
        options: LlmCallGovernorOptions,
        private readonly clock: IClock,
        private readonly telemetry?: TelemetryService
    ) {
        this.maxConcurrent = Math.max(1, options.maxConcurrent)
        this.maxRequestsPerWindow = Math.max(1, options.maxRequestsPerWindow)
        this.windowMs = options.windowMs ?? 60_000
    }

    get inFlight(): number {
        return this.active
    }

    get queued(): number {
        return this.waiters.length
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquireSlot()
        try {
            await this.admitInWindow()
            return await task()
        } finally {
            this.releaseSlot()
        }
    }

    /**
     * Suspend admissions until `now + ms` (extends, never shortens, an active pause).
     */
    pauseFor(ms: number): void {
        const until = this.clock.nowMs() + Math.max(0, ms)
        if (until <= this.pausedUntilMs) return
        this.pausedUntilMs = until
        this.telemetry?.trackPipelineEventStrict('LLM.Governor.Paused', { pauseMs: ms, queued: this.waiters.length })
    }

    private acquireSlot(): Promise<void> {
        if (this.active < this.maxConcurrent) {
            this.active++
            return Promise.resolve()
        }
        // The releasing caller hands its slot over, so `active` is unchanged on wake-up
        return new Promise<void>((resolve) => this.waiters.push(resolve))
    }

    private releaseSlot(): void {
        const next = this.waiters.shift()
        if (next) {
            next()
        } else {
            this.active--
        }
    }

    private async admitInWindow(): Promise<void> {
        for (;;) {
            const now = this.clock.nowMs()
            if (now < this.pausedUntilMs) {
                await this.clock.sleep(this.pausedUntilMs - now)
                continue
            }
            while (this.startTimes.length > 0 && now - this.startTimes[0] >= this.windowMs) {
                this.startTimes.shift()
            }
            if (this.startTimes.length < this.maxRequestsPerWindow) {
                this.startTimes.push(now)
                return
            }
            await this.clock.sleep(this.startTimes[0] + this.windowMs - now)
        }
    }
}
