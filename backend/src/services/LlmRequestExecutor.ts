/**
 * Runs one logical model request under the retry policy.
 *
 * Each attempt goes through the call governor. The response is validated by the caller's
 * `accept` function; a rejected response is retried with the rejection passed back to
 * `buildMessages` so the next request can carry a corrective instruction. Provider rate-limit
 * signals pause the governor and retry without consuming an attempt, up to the policy's
 * rate-limit ceiling.
 *
 * Embedding batches take the same path, so every outbound model call is admitted by the
 * governor and backed off under one policy.
 */
import type { ChatMessage, IClock } from '@specmap/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { IEmbeddingClient, ILlmClient, LlmCallDiagnostics, LlmCallOutcome, LlmCompleteOptions } from './llmClient.js'
import type { LlmCallGovernor } from './LlmCallGovernor.js'
import type { RetryPolicy } from './RetryPolicy.js'

export type AcceptResult<T> = { status: 'valid'; value: T } | { status: 'rejected'; reason: string }

export interface Rejection {
    content: string
    reason: string
}

export type LlmOperation = 'translation' | 'extraction' | 'relevance' | 'embedding'

export interface LlmRequest<T> {
    operation: LlmOperation
    buildMessages(lastRejection?: Rejection): ChatMessage[]
    accept(content: string): AcceptResult<T>
    options?: Omit<LlmCompleteOptions, 'messages'>
    /** Extra telemetry properties (fragment id, source language, ...) */
    context?: Record<string, unknown>
}

export type LlmFailureReason = 'rejected' | 'rate-limit-exhausted' | Exclude<LlmCallOutcome, 'success' | 'rate-limited'>

export interface LlmFailure {
    reason: LlmFailureReason
    detail: string
    attempts: number
    rateLimitWaits: number
    rejections: string[]
}

export type LlmRequestOutcome<T> =
    | { ok: true; value: T; attempts: number; rateLimitWaits: number; rejections: string[] }
    | { ok: false; failure: LlmFailure }

type AttemptResult<T> =
    | { kind: 'accepted'; value: T }
    | { kind: 'rejected'; rejection: Rejection }
    | { kind: 'call-failed'; diagnostics: LlmCallDiagnostics }

interface AttemptLoop<T> {
    operation: LlmOperation
    context?: Record<string, unknown>
    attempt(lastRejection: Rejection | undefined): Promise<AttemptResult<T>>
}

@injectable()
export class LlmRequestExecutor {
    constructor(
        @inject(TOKENS.LlmClient) private readonly client: ILlmClient,
        @inject(TOKENS.EmbeddingClient) private readonly embeddingClient: IEmbeddingClient,
        @inject(TOKENS.LlmCallGovernor) private readonly governor: LlmCallGovernor,
        @inject(TOKENS.RetryPolicy) private readonly policy: RetryPolicy,
        @inject(TOKENS.Clock) private readonly clock: IClock,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    get embeddingsAvailable(): boolean {
        return this.embeddingClient.embeddingsAvailable()
    }

    execute<T>(request: LlmRequest<T>, policy: RetryPolicy = this.policy): Promise<LlmRequestOutcome<T>> {
        return this.runAttempts(
            {
                operation: request.operation,
                context: request.context,
                attempt: async (lastRejection) => {
                    const messages = request.buildMessages(lastRejection)
                    const { result, diagnostics } = await this.governor.run(() => this.client.complete({ ...request.options, messages }))
                    if (diagnostics.outcome !== 'success') return { kind: 'call-failed', diagnostics }
                    if (!result) return { kind: 'call-failed', diagnostics: { ...diagnostics, outcome: 'empty' } }
                    const accepted = request.accept(result.content)
                    if (accepted.status === 'valid') return { kind: 'accepted', value: accepted.value }
                    return { kind: 'rejected', rejection: { content: result.content, reason: accepted.reason } }
                }
            },
            policy
        )
    }

    /**
     * One embedding batch; vectors come back in input order.
     */
    embed(texts: readonly string[], policy: RetryPolicy = this.policy): Promise<LlmRequestOutcome<number[][]>> {
        return this.runAttempts(
            {
                operation: 'embedding',
                context: { texts: texts.length },
                attempt: async () => {
                    const { vectors, diagnostics } = await this.governor.run(() => this.embeddingClient.embed(texts))
                    if (diagnostics.outcome !== 'success') return { kind: 'call-failed', diagnostics }
                    if (!vectors) return { kind: 'call-failed', diagnostics: { ...diagnostics, outcome: 'empty' } }
                    if (vectors.length !== texts.length) {
                        return {
                            kind: 'rejected',
                            rejection: { content: '', reason: `expected ${texts.length} vectors, got ${vectors.length}` }
                        }
                    }
                    return { kind: 'accepted', value: vectors }
                }
            },
            policy
        )
    }

    private async runAttempts<T>(loop: AttemptLoop<T>, policy: RetryPolicy): Promise<LlmRequestOutcome<T>> {
        let attempts = 0
        let rateLimitWaits = 0
        let lastRejection: Rejection | undefined
        let lastFailure: { reason: LlmFailureReason; detail: string } = { reason: 'error', detail: 'no attempt made' }
        const rejections: string[] = []

        while (attempts < policy.maxAttempts) {
            const result = await loop.attempt(lastRejection)

            if (result.kind === 'call-failed' && result.diagnostics.outcome === 'rate-limited') {
                if (rateLimitWaits >= policy.rateLimitMaxWaits) {
                    lastFailure = {
                        reason: 'rate-limit-exhausted',
                        detail: `rate limited ${rateLimitWaits + 1} times`
                    }
                    break
                }
                rateLimitWaits++
                const waitMs = policy.rateLimitDelayMs(rateLimitWaits, result.diagnostics.retryAfterMs)
                this.telemetry.trackPipelineEventStrict('LLM.Call.RateLimited', {
                    ...loop.context,
                    operation: loop.operation,
                    wait: rateLimitWaits,
                    waitMs
                })
                this.governor.pauseFor(waitMs)
                continue
            }

            attempts++

            if (result.kind === 'accepted') {
                return { ok: true, value: result.value, attempts, rateLimitWaits, rejections }
            }
            if (result.kind === 'rejected') {
                rejections.push(result.rejection.reason)
                lastRejection = result.rejection
                lastFailure = { reason: 'rejected', detail: result.rejection.reason }
                continue
            }

            const { diagnostics } = result
            const reason: LlmFailureReason = diagnostics.outcome === 'success' || diagnostics.outcome === 'rate-limited' ? 'empty' : diagnostics.outcome
            lastFailure = { reason, detail: diagnostics.errorMessage ?? diagnostics.errorCode ?? reason }
            this.telemetry.trackPipelineEventStrict('LLM.Call.Failed', {
                ...loop.context,
                operation: loop.operation,
                attempt: attempts,
                outcome: reason,
                httpStatus: diagnostics.httpStatus,
                errorCode: diagnostics.errorCode
            })

            if (attempts < policy.maxAttempts) {
                await this.clock.sleep(policy.backoffDelayMs(attempts))
            }
        }

        return { ok: false, failure: { ...lastFailure, attempts, rateLimitWaits, rejections } }
    }
}
