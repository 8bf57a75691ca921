/**
 * Retry and backoff schedule shared by translation, extraction and relevance calls.
 *
 * Two separate budgets:
 * - attempts: transport failures and rejected responses
 * - rate-limit waits: provider 429s, which never consume an attempt
 */
export interface RetryPolicyOptions {
    maxAttempts: number
    initialDelayMs: number
    /** Default 2 */
    multiplier?: number
    /** Default 30s */
    maxDelayMs?: number
    rateLimitMaxWaits: number
}

export class RetryPolicy {
    readonly maxAttempts: number
    readonly initialDelayMs: number
    readonly multiplier: number
    readonly maxDelayMs: number
    readonly rateLimitMaxWaits: number

    constructor(options: RetryPolicyOptions) {
        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer (got ${options.maxAttempts})`)
        }
        this.maxAttempts = options.maxAttempts
        this.initialDelayMs = Math.max(0, options.initialDelayMs)
        this.multiplier = options.multiplier ?? 2
        this.maxDelayMs = options.maxDelayMs ?? 30_000
        this.rateLimitMaxWaits = Math.max(0, options.rateLimitMaxWaits)
    }

    /**
     * Delay after the n-th failed attempt (1-based): initial * multiplier^(n-1), capped.
     */
    backoffDelayMs(failedAttempt: number): number {
        const raw = this.initialDelayMs * Math.pow(this.multiplier, Math.max(0, failedAttempt - 1))
        return Math.min(raw, this.maxDelayMs)
    }

    /**
     * Delay before the n-th rate-limit retry (1-based). The provider's hint wins when present.
     */
    rateLimitDelayMs(wait: number, retryAfterMs?: number): number {
        if (retryAfterMs !== undefined) return Math.min(Math.max(0, retryAfterMs), this.maxDelayMs)
        return this.backoffDelayMs(wait)
    }
}
