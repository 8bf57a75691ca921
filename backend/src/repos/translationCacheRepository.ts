/**
 * Translation Cache Repository Interface
 *
 * Shared across all concurrent fragment pipelines of a run (and, when file-backed, across runs).
 * Entries are keyed by `translationCacheKey(rawText, targetLanguage)` and never invalidated within
 * a run. Writes are whole-entry replacements: a reader sees either no entry or a complete one.
 */
import { z } from 'zod'

export const TranslationCacheEntrySchema = z.object({
    key: z.string().min(1),
    sourceLanguage: z.string().min(1),
    targetLanguage: z.string().min(1),
    translatedText: z.string(),
    createdUtc: z.string()
})
export type TranslationCacheEntry = z.infer<typeof TranslationCacheEntrySchema>

export interface ITranslationCacheRepository {
    /**
     * @returns the complete entry, or null on a miss
     */
    get(key: string): Promise<TranslationCacheEntry | null>

    /**
     * Insert or replace an entry atomically.
     */
    put(entry: TranslationCacheEntry): Promise<void>
}
