/**
 * File-Backed Translation Cache
 *
 * One JSON file per entry under the cache directory (`<key>.json`), so runs can share
 * translations. Writes go to a unique temp file first and are renamed into place; rename is
 * atomic on the same filesystem, so a concurrent reader never sees a half-written entry.
 *
 * An unreadable or invalid entry file counts as a miss and is overwritten on the next put.
 */
import { injectable } from 'inversify'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import { BaseMemoryRepository } from './base/BaseMemoryRepository.js'
import { TranslationCacheEntrySchema, type ITranslationCacheRepository, type TranslationCacheEntry } from './translationCacheRepository.js'

const KEY_PATTERN = /^[0-9a-f]{16,128}$/

function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

@injectable()
export class FileTranslationCacheRepository
    extends BaseMemoryRepository<TranslationCacheEntry>
    implements ITranslationCacheRepository
{
    private directoryReady: Promise<void> | undefined

    constructor(private readonly directory: string) {
        super()
    }

    async get(key: string): Promise<TranslationCacheEntry | null> {
        const memo = this.lookup(key)
        if (memo) return memo

        let content: string
        try {
            content = await readFile(this.pathFor(key), 'utf-8')
        } catch (error) {
            if (isMissingFile(error)) return null
            throw error
        }

        let payload: unknown
        try {
            payload = JSON.parse(content)
        } catch {
            console.warn(`Ignoring unreadable translation cache entry ${key}`)
            return null
        }
        const parsed = TranslationCacheEntrySchema.safeParse(payload)
        if (!parsed.success || parsed.data.key !== key) {
            console.warn(`Ignoring invalid translation cache entry ${key}`)
            return null
        }

        this.store(key, parsed.data)
        return parsed.data
    }

    async put(entry: TranslationCacheEntry): Promise<void> {
        await this.ensureDirectory()
        const target = this.pathFor(entry.key)
        const temp = `${target}.${uuidv4()}.tmp`
        try {
            await writeFile(temp, JSON.stringify(entry, null, 2), 'utf-8')
            await rename(temp, target)
        } catch (error) {
            await rm(temp, { force: true })
            throw error
        }
        this.store(entry.key, { ...entry })
    }

    private pathFor(key: string): string {
        if (!KEY_PATTERN.test(key)) {
            throw new Error(`Invalid translation cache key: ${key}`)
        }
        return join(this.directory, `${key}.json`)
    }

    private ensureDirectory(): Promise<void> {
        if (!this.directoryReady) {
            this.directoryReady = mkdir(this.directory, { recursive: true }).then(() => undefined)
        }
        return this.directoryReady
    }
}
