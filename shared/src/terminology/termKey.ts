/**
 * Term normalization for table lookups and similarity scoring.
 *
 * Keys are accent-folded, lowercased and reduced to space-separated alphanumeric tokens, so
 * "Kontrastverhältnis", "KONTRASTVERHALTNIS" and "kontrast-verhältnis " all collapse to
 * the same or near-identical keys.
 */

import { unitFamilyOf } from './unitFamilies.js'

const COMBINING_MARKS = /\p{M}/gu
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]+/gu

export function normalizeTermKey(term: string): string {
    return term
        .normalize('NFKD')
        .replace(COMBINING_MARKS, '')
        .toLowerCase()
        .replace(/ß/g, 'ss')
        .replace(NON_ALPHANUMERIC, ' ')
        .trim()
}

export function termTokens(term: string): string[] {
    const key = normalizeTermKey(term)
    return key ? key.split(' ') : []
}

const TRAILING_QUALIFIER = /^(.*?)\s*[([]([^)\]]+)[)\]]\s*$/

/**
 * Split a template label such as "Luminance (cd/m²)" into its name and unit.
 * The bracketed part is only treated as a unit when it names a known unit family;
 * "Viewing angle (typ.)" keeps its full text and gets no unit.
 */
export function splitLabelUnit(label: string): { name: string; unit?: string } {
    const trimmed = label.trim()
    const match = TRAILING_QUALIFIER.exec(trimmed)
    if (!match || !match[1]) return { name: trimmed }
    const unit = match[2].trim()
    if (unitFamilyOf(unit) === 'unknown') return { name: trimmed }
    return { name: match[1].trim(), unit }
}
