/**
 * Spec Extraction Engine
 *
 * TranslatedFragment → ExtractedSpecInstance[] via structured LLM extraction.
 *
 * Request: fixed instruction + domain context + few-shot examples + template targets + fragment.
 * Every response is validated against the extraction schema before anything is accepted; a
 * rejected response is retried with a corrective instruction. When the retry budget runs out the
 * fragment's extraction is marked failed and contributes no instances.
 *
 * Within one fragment, findings with the same name and value collapse to the one with the highest
 * confidence. Confidence is carried exactly as the model reported it.
 */
import {
    buildExtractionMessages,
    instanceIdOf,
    normalizeTermKey,
    parseExtractionResponse,
    type ExtractedSpecInstance,
    type ExtractionRecord,
    type FragmentRef,
    type TranslatedFragment
} from '@specmap/shared'
import { inject, injectable } from 'inversify'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { LlmRequestExecutor } from './LlmRequestExecutor.js'

const EXCERPT_FALLBACK_LENGTH = 200

export interface FragmentExtraction {
    fragmentRef: FragmentRef
    status: 'succeeded' | 'failed'
    instances: ExtractedSpecInstance[]
    attempts: number
    collapsedDuplicates: number
    failureDetail?: string
}

/**
 * Collapse records sharing a normalized name and value. The survivor keeps the position of the
 * first occurrence and the content of the highest-confidence occurrence (earliest on ties).
 */
export function collapseDuplicates(records: readonly ExtractionRecord[]): ExtractionRecord[] {
    const byKey = new Map<string, ExtractionRecord>()
    for (const record of records) {
        const key = `${normalizeTermKey(record.spec_name)}|${record.value}`
        const current = byKey.get(key)
        if (!current || record.confidence > current.confidence) {
            byKey.set(key, record)
        }
    }
    // Map iteration follows first insertion, so survivors keep first-occurrence order
    return [...byKey.values()]
}

@injectable()
export class SpecExtractionEngine {
    constructor(
        @inject(LlmRequestExecutor) private readonly executor: LlmRequestExecutor,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async extract(fragment: TranslatedFragment, targetLabels: readonly string[] = []): Promise<FragmentExtraction> {
        const fragmentId = fragment.ref.fragmentId
        const outcome = await this.executor.execute<ExtractionRecord[]>({
            operation: 'extraction',
            buildMessages: (lastRejection) =>
                buildExtractionMessages(
                    { text: fragment.translatedText, targetLabels },
                    lastRejection ? { previousContent: lastRejection.content, reason: lastRejection.reason } : undefined
                ),
            accept: (content) => {
                const parsed = parseExtractionResponse(content)
                return parsed.status === 'valid' ? { status: 'valid', value: parsed.records } : parsed
            },
            options: { temperature: 0, jsonMode: true },
            context: { fragmentId }
        })

        const rejections = outcome.ok ? outcome.rejections : outcome.failure.rejections
        rejections.forEach((reason, index) => {
            this.telemetry.trackPipelineEventStrict('Extraction.Response.Rejected', { fragmentId, attempt: index + 1, reason })
        })

        if (!outcome.ok) {
            const { failure } = outcome
            this.telemetry.trackPipelineEventStrict('Extraction.Fragment.Failed', {
                fragmentId,
                reason: failure.reason,
                attempts: failure.attempts,
                rateLimitWaits: failure.rateLimitWaits
            })
            return {
                fragmentRef: fragment.ref,
                status: 'failed',
                instances: [],
                attempts: failure.attempts,
                collapsedDuplicates: 0,
                failureDetail: `${failure.reason}: ${failure.detail}`
            }
        }

        const records = collapseDuplicates(outcome.value)
        const collapsedDuplicates = outcome.value.length - records.length
        if (collapsedDuplicates > 0) {
            this.telemetry.trackPipelineEventStrict('Extraction.Duplicate.Collapsed', { fragmentId, collapsed: collapsedDuplicates })
        }

        const instances = records.map((record, ordinal) => this.toInstance(fragment, record, ordinal))
        this.telemetry.trackPipelineEventStrict('Extraction.Fragment.Succeeded', {
            fragmentId,
            instances: instances.length,
            attempts: outcome.attempts
        })

        return { fragmentRef: fragment.ref, status: 'succeeded', instances, attempts: outcome.attempts, collapsedDuplicates }
    }

    /**
     * Extract from several fragments in sequence. Failed fragments contribute nothing.
     */
    async extractAll(fragments: readonly TranslatedFragment[], targetLabels: readonly string[] = []): Promise<ExtractedSpecInstance[]> {
        const instances: ExtractedSpecInstance[] = []
        for (const fragment of fragments) {
            const result = await this.extract(fragment, targetLabels)
            instances.push(...result.instances)
        }
        return instances
    }

    private toInstance(fragment: TranslatedFragment, record: ExtractionRecord, ordinal: number): ExtractedSpecInstance {
        const instance: ExtractedSpecInstance = {
            instanceId: instanceIdOf(fragment.ref.fragmentId, ordinal),
            fragmentRef: fragment.ref,
            ordinal,
            rawSpecName: record.spec_name,
            value: record.value,
            unit: record.unit,
            confidence: record.confidence,
            sourceExcerpt: record.source_text || fragment.translatedText.slice(0, EXCERPT_FALLBACK_LENGTH)
        }
        return record.condition ? { ...instance, condition: record.condition } : instance
    }
}
