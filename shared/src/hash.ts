/**
 * Content hashing for cache keys.
 *
 * Canonical JSON (recursively sorted keys, undefined fields dropped) hashed with SHA256,
 * so the same logical input always yields the same key across runs and processes.
 */

import crypto from 'node:crypto'

/**
 * Serialize a value to deterministic compact JSON.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortObjectKeys(value))
}

export function computeContentHash(value: unknown): string {
    return crypto.createHash('sha256').update(canonicalJson(value), 'utf8').digest('hex')
}

/**
 * Cache key for a translation request: (raw text, target language).
 * The text is hashed verbatim; whitespace is significant because it is part of the source.
 */
export function translationCacheKey(rawText: string, targetLanguage: string): string {
    return computeContentHash({ targetLanguage: targetLanguage.toLowerCase(), text: rawText })
}

function sortObjectKeys(obj: unknown): unknown {
    if (obj === null || obj === undefined) {
        return obj
    }

    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys)
    }

    if (typeof obj === 'object') {
        const sorted: Record<string, unknown> = {}
        const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

        for (const [key, value] of entries) {
            if (value !== undefined) {
                sorted[key] = sortObjectKeys(value)
            }
        }

        return sorted
    }

    return obj
}
