/**
 * Lexical similarity between spec names / template labels.
 *
 * Score in [0,1] = max(normalized edit similarity, token Jaccard) over normalized term keys.
 * Edit similarity catches typos and OCR noise ("Transmitance"); Jaccard catches reordered or
 * partially overlapping multi-word names ("ratio contrast").
 */

import { normalizeTermKey } from './termKey.js'

/**
 * Levenshtein edit distance (dynamic programming, two rolling rows).
 */
export function editDistance(a: string, b: string): number {
    if (a.length === 0) return b.length
    if (b.length === 0) return a.length

    let previous = Array.from({ length: b.length + 1 }, (_, j) => j)
    let current = new Array<number>(b.length + 1).fill(0)

    for (let i = 1; i <= a.length; i++) {
        current[0] = i
        for (let j = 1; j <= b.length; j++) {
            const substitution = previous[j - 1] + (a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1)
            current[j] = Math.min(substitution, previous[j] + 1, current[j - 1] + 1)
        }
        ;[previous, current] = [current, previous]
    }

    return previous[b.length]
}

export function editSimilarity(a: string, b: string): number {
    const longest = Math.max(a.length, b.length)
    if (longest === 0) return 1
    return 1 - editDistance(a, b) / longest
}

export function tokenJaccard(a: string, b: string): number {
    const ta = new Set(a.split(' ').filter(Boolean))
    const tb = new Set(b.split(' ').filter(Boolean))
    if (ta.size === 0 && tb.size === 0) return 1
    let shared = 0
    for (const token of ta) {
        if (tb.has(token)) shared++
    }
    return shared / (ta.size + tb.size - shared)
}

export function lexicalSimilarity(a: string, b: string): number {
    const ka = normalizeTermKey(a)
    const kb = normalizeTermKey(b)
    if (ka === kb) return 1
    return Math.max(editSimilarity(ka, kb), tokenJaccard(ka, kb))
}
