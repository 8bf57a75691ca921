/**
 * Language Normalizer
 *
 * DocumentFragment → TranslatedFragment in the working language.
 *
 * - Language: the parser's value when it set one, otherwise heuristic detection
 * - Working-language fragments pass through as `native`
 * - Other fragments are translated through the LLM with display/automotive domain context;
 *   results are cached by hash(raw text, target language) and concurrent requests for the same
 *   key share one call
 * - After the retry policy is exhausted the fragment proceeds as `failed` with its original text
 */
import {
    detectLanguage,
    fragmentRefOf,
    languageDisplayName,
    primaryLanguageSubtag,
    translationCacheKey,
    buildTranslationMessages,
    type DocumentFragment,
    type IClock,
    type LanguageProfileSet,
    type TranslatedFragment
} from '@specmap/shared'
import { inject, injectable } from 'inversify'
import type { PipelineConfig } from '../config/pipelineConfig.js'
import { TOKENS } from '../di/tokens.js'
import type { ITranslationCacheRepository } from '../repos/translationCacheRepository.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { LlmRequestExecutor } from './LlmRequestExecutor.js'

type TranslationAttempt = { ok: true; text: string; fromCache: boolean } | { ok: false; detail: string }

@injectable()
export class LanguageNormalizer {
    private readonly inFlight = new Map<string, Promise<TranslationAttempt>>()

    constructor(
        @inject(TOKENS.PipelineConfig) private readonly config: PipelineConfig,
        @inject(TOKENS.TranslationCacheRepository) private readonly cache: ITranslationCacheRepository,
        @inject(LlmRequestExecutor) private readonly executor: LlmRequestExecutor,
        @inject(TOKENS.LanguageProfiles) private readonly profiles: LanguageProfileSet,
        @inject(TOKENS.Clock) private readonly clock: IClock,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * Language of a fragment (primary subtag): the parser's value when set, detection otherwise.
     */
    detectLanguage(fragment: DocumentFragment): string {
        const declared = fragment.detectedLanguage ? primaryLanguageSubtag(fragment.detectedLanguage) : ''
        if (declared && declared !== 'und') return declared
        return detectLanguage(fragment.rawText, this.config.workingLanguage, this.profiles).language
    }

    async normalize(fragment: DocumentFragment): Promise<TranslatedFragment> {
        const ref = fragmentRefOf(fragment)
        const sourceLanguage = this.detectLanguage(fragment)
        const targetLanguage = this.config.workingLanguage

        if (sourceLanguage === primaryLanguageSubtag(targetLanguage)) {
            this.telemetry.trackPipelineEventStrict('Translation.Native.Skipped', { fragmentId: ref.fragmentId, sourceLanguage })
            return {
                fragment,
                ref,
                sourceLanguage,
                translatedText: fragment.rawText,
                translationStatus: 'native',
                fromCache: false
            }
        }

        const attempt = await this.translate(fragment.rawText, sourceLanguage, targetLanguage, ref.fragmentId)

        if (!attempt.ok) {
            return {
                fragment,
                ref,
                sourceLanguage,
                translatedText: fragment.rawText,
                translationStatus: 'failed',
                fromCache: false,
                failureDetail: attempt.detail
            }
        }

        return {
            fragment,
            ref,
            sourceLanguage,
            translatedText: attempt.text,
            translationStatus: 'translated',
            fromCache: attempt.fromCache
        }
    }

    private async translate(rawText: string, sourceLanguage: string, targetLanguage: string, fragmentId: string): Promise<TranslationAttempt> {
        const key = translationCacheKey(rawText, targetLanguage)

        const pending = this.inFlight.get(key)
        if (pending) {
            const shared = await pending
            if (!shared.ok) return shared
            this.telemetry.trackPipelineEventStrict('Translation.Cache.Hit', { fragmentId, sourceLanguage, shared: true })
            return { ...shared, fromCache: true }
        }

        // Registered before the first await so concurrent callers for the same key join this lookup
        const work = this.lookupOrRequest(key, rawText, sourceLanguage, targetLanguage, fragmentId)
        this.inFlight.set(key, work)
        try {
            return await work
        } finally {
            this.inFlight.delete(key)
        }
    }

    private async lookupOrRequest(
        key: string,
        rawText: string,
        sourceLanguage: string,
        targetLanguage: string,
        fragmentId: string
    ): Promise<TranslationAttempt> {
        const cached = await this.readCache(key)
        if (cached !== null) {
            this.telemetry.trackPipelineEventStrict('Translation.Cache.Hit', { fragmentId, sourceLanguage })
            return { ok: true, text: cached, fromCache: true }
        }
        this.telemetry.trackPipelineEventStrict('Translation.Cache.Miss', { fragmentId, sourceLanguage })
        return this.requestTranslation(key, rawText, sourceLanguage, targetLanguage, fragmentId)
    }

    private async requestTranslation(
        key: string,
        rawText: string,
        sourceLanguage: string,
        targetLanguage: string,
        fragmentId: string
    ): Promise<TranslationAttempt> {
        const messages = buildTranslationMessages({
            text: rawText,
            sourceLanguageName: languageDisplayName(sourceLanguage, this.profiles),
            targetLanguageName: languageDisplayName(targetLanguage, this.profiles)
        })

        const outcome = await this.executor.execute<string>({
            operation: 'translation',
            buildMessages: () => messages,
            accept: (content) => {
                const text = content.trim()
                return text ? { status: 'valid', value: text } : { status: 'rejected', reason: 'empty translation' }
            },
            options: { temperature: 0, maxTokens: Math.max(256, rawText.length * 2) },
            context: { fragmentId, sourceLanguage }
        })

        if (!outcome.ok) {
            const detail = `${outcome.failure.reason}: ${outcome.failure.detail}`
            this.telemetry.trackPipelineEventStrict('Translation.Request.Failed', {
                fragmentId,
                sourceLanguage,
                reason: outcome.failure.reason,
                attempts: outcome.failure.attempts,
                rateLimitWaits: outcome.failure.rateLimitWaits
            })
            return { ok: false, detail }
        }

        this.telemetry.trackPipelineEventStrict('Translation.Request.Succeeded', {
            fragmentId,
            sourceLanguage,
            attempts: outcome.attempts
        })

        await this.writeCache({
            key,
            sourceLanguage,
            targetLanguage,
            translatedText: outcome.value,
            createdUtc: this.clock.nowIso()
        })
        return { ok: true, text: outcome.value, fromCache: false }
    }

    private async readCache(key: string): Promise<string | null> {
        try {
            const entry = await this.cache.get(key)
            return entry ? entry.translatedText : null
        } catch (error) {
            console.warn(`Translation cache read failed for ${key}:`, error instanceof Error ? error.message : String(error))
            return null
        }
    }

    private async writeCache(entry: Parameters<ITranslationCacheRepository['put']>[0]): Promise<void> {
        try {
            await this.cache.put(entry)
        } catch (error) {
            console.warn(`Translation cache write failed for ${entry.key}:`, error instanceof Error ? error.message : String(error))
        }
    }
}
