/**
 * Document Relevance Filter
 *
 * Optional screen run once per source document before any translation or extraction:
 * 1. keyword pre-filter: case-insensitive substring match over all fragment text
 * 2. model confirmation on the first fragments of documents that passed the keywords
 *
 * A model call that fails or returns an unusable verdict keeps the document.
 */
import { buildRelevanceMessages, parseRelevanceResponse, type DocumentFragment, type RelevanceResponse } from '@specmap/shared'
import { inject, injectable } from 'inversify'
import type { PipelineConfig } from '../config/pipelineConfig.js'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { LlmRequestExecutor } from './LlmRequestExecutor.js'

export const RELEVANCE_SAMPLE_FRAGMENTS = 5
const RELEVANCE_SAMPLE_MAX_CHARS = 6000

export type RelevanceStage = 'disabled' | 'keywords' | 'model' | 'model-unavailable'

export interface RelevanceDecision {
    sourceFile: string
    relevant: boolean
    stage: RelevanceStage
    reason: string
}

export function findKeyword(fragments: readonly DocumentFragment[], keywords: readonly string[]): string | undefined {
    const lowered = keywords.map((k) => k.toLowerCase())
    for (const fragment of fragments) {
        const text = fragment.rawText.toLowerCase()
        const hit = lowered.find((keyword) => text.includes(keyword))
        if (hit) return hit
    }
    return undefined
}

@injectable()
export class DocumentRelevanceFilter {
    constructor(
        @inject(TOKENS.PipelineConfig) private readonly config: PipelineConfig,
        @inject(LlmRequestExecutor) private readonly executor: LlmRequestExecutor,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    get enabled(): boolean {
        return this.config.relevanceKeywords.length > 0
    }

    async assess(sourceFile: string, fragments: readonly DocumentFragment[]): Promise<RelevanceDecision> {
        const decision = await this.decide(sourceFile, fragments)
        if (decision.stage !== 'disabled') {
            this.telemetry.trackPipelineEventStrict(decision.relevant ? 'Document.Relevance.Accepted' : 'Document.Relevance.Filtered', {
                sourceFile,
                stage: decision.stage
            })
        }
        return decision
    }

    private async decide(sourceFile: string, fragments: readonly DocumentFragment[]): Promise<RelevanceDecision> {
        if (!this.enabled) {
            return { sourceFile, relevant: true, stage: 'disabled', reason: 'relevance filter disabled' }
        }

        const keyword = findKeyword(fragments, this.config.relevanceKeywords)
        if (!keyword) {
            return { sourceFile, relevant: false, stage: 'keywords', reason: 'no relevance keyword found' }
        }

        const sample = fragments
            .slice(0, RELEVANCE_SAMPLE_FRAGMENTS)
            .map((f) => `[${f.locator}]\n${f.rawText}`)
            .join('\n\n')
            .slice(0, RELEVANCE_SAMPLE_MAX_CHARS)

        const outcome = await this.executor.execute<RelevanceResponse>({
            operation: 'relevance',
            buildMessages: () => buildRelevanceMessages(sample),
            accept: (content) => {
                const verdict = parseRelevanceResponse(content)
                return verdict ? { status: 'valid', value: verdict } : { status: 'rejected', reason: 'not a relevance verdict' }
            },
            options: { temperature: 0, jsonMode: true, maxTokens: 200 },
            context: { sourceFile }
        })

        if (!outcome.ok) {
            return {
                sourceFile,
                relevant: true,
                stage: 'model-unavailable',
                reason: `keyword "${keyword}" matched; model check failed (${outcome.failure.reason})`
            }
        }

        return {
            sourceFile,
            relevant: outcome.value.is_relevant,
            stage: 'model',
            reason: outcome.value.reason || (outcome.value.is_relevant ? 'model confirmed relevance' : 'model judged not relevant')
        }
    }
}
