/**
 * In-Memory Translation Cache
 *
 * Process-local cache for a single run; also the default when no cache directory is configured.
 */
import { injectable } from 'inversify'
import { BaseMemoryRepository } from './base/BaseMemoryRepository.js'
import type { ITranslationCacheRepository, TranslationCacheEntry } from './translationCacheRepository.js'

@injectable()
export class MemoryTranslationCacheRepository
    extends BaseMemoryRepository<TranslationCacheEntry>
    implements ITranslationCacheRepository
{
    async get(key: string): Promise<TranslationCacheEntry | null> {
        return this.lookup(key) ?? null
    }

    async put(entry: TranslationCacheEntry): Promise<void> {
        this.store(entry.key, { ...entry })
    }
}
