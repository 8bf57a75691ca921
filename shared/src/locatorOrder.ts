/**
 * Deterministic ordering for fragments and instances.
 *
 * Locators are compared "naturally" so that "Page 2" sorts before "Page 10".
 * Every comparator here ends in a plain code-unit comparison, making the order total:
 * two distinct inputs never compare equal, so sorting is independent of arrival order.
 */

import type { ExtractedSpecInstance, FragmentRef } from './specModels.js'

const naturalCollator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' })

function codeUnitCompare(a: string, b: string): number {
    if (a === b) return 0
    return a < b ? -1 : 1
}

/** Natural-order string comparison with a code-unit tie-break. */
export function compareNatural(a: string, b: string): number {
    return naturalCollator.compare(a, b) || codeUnitCompare(a, b)
}

export function compareFragmentRefs(a: FragmentRef, b: FragmentRef): number {
    return compareNatural(a.sourceFile, b.sourceFile) || compareNatural(a.locator, b.locator)
}

/** Earliest fragment first, then position within the fragment. */
export function compareInstancesByLocation(a: ExtractedSpecInstance, b: ExtractedSpecInstance): number {
    return (
        compareFragmentRefs(a.fragmentRef, b.fragmentRef) ||
        a.ordinal - b.ordinal ||
        codeUnitCompare(a.instanceId, b.instanceId)
    )
}

/**
 * Parse an A1-style coordinate ("B12") into zero-based column and one-based row.
 * Returns null for anything that is not a plain A1 reference.
 */
export function parseCellCoordinate(coordinate: string): { column: number; row: number } | null {
    const match = /^([A-Z]+)(\d+)$/.exec(coordinate.trim().toUpperCase())
    if (!match) return null
    let column = 0
    for (const ch of match[1]) {
        column = column * 26 + (ch.charCodeAt(0) - 64)
    }
    return { column: column - 1, row: Number.parseInt(match[2], 10) }
}

/** Row-major ordering of cell coordinates; unparseable coordinates sort last. */
export function compareCellCoordinates(a: string, b: string): number {
    const pa = parseCellCoordinate(a)
    const pb = parseCellCoordinate(b)
    if (pa && pb) {
        return pa.row - pb.row || pa.column - pb.column || codeUnitCompare(a, b)
    }
    if (pa) return -1
    if (pb) return 1
    return codeUnitCompare(a, b)
}
