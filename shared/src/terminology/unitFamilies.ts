/**
 * Unit family lookup.
 *
 * Units are compared after NFKC folding (so "cd/m²" == "cd/m2", "℃" == "°C", micro sign == mu),
 * lowercasing and whitespace removal.
 */

export type UnitFamily =
    | 'luminance'
    | 'ratio'
    | 'length'
    | 'pressure'
    | 'percent'
    | 'angle'
    | 'temperature'
    | 'hardness'
    | 'time'
    | 'power'
    | 'voltage'
    | 'frequency'
    | 'pixel-density'
    | 'unknown'

const UNIT_FAMILY_TABLE: Record<string, UnitFamily> = {
    'cd/m2': 'luminance',
    nit: 'luminance',
    nits: 'luminance',
    ':1': 'ratio',
    mm: 'length',
    '\u03bcm': 'length',
    um: 'length',
    nm: 'length',
    cm: 'length',
    inch: 'length',
    mpa: 'pressure',
    gpa: 'pressure',
    kpa: 'pressure',
    'n/mm2': 'pressure',
    '%': 'percent',
    '°': 'angle',
    deg: 'angle',
    degree: 'angle',
    degrees: 'angle',
    '°c': 'temperature',
    '°f': 'temperature',
    h: 'hardness',
    hv: 'hardness',
    mohs: 'hardness',
    ms: 'time',
    '\u03bcs': 'time',
    s: 'time',
    w: 'power',
    mw: 'power',
    v: 'voltage',
    mv: 'voltage',
    hz: 'frequency',
    khz: 'frequency',
    ppi: 'pixel-density',
    dpi: 'pixel-density'
}

export function normalizeUnit(unit: string): string {
    return unit.normalize('NFKC').toLowerCase().replace(/\s+/g, '')
}

export function unitFamilyOf(unit: string | undefined): UnitFamily {
    if (!unit) return 'unknown'
    return UNIT_FAMILY_TABLE[normalizeUnit(unit)] ?? 'unknown'
}

/**
 * Two units conflict only when both resolve to known, different families.
 */
export function unitFamiliesConflict(a: string, b: string): boolean {
    return a !== 'unknown' && b !== 'unknown' && a !== b
}
