/**
 * Core domain model types for the specification mapping pipeline.
 *
 * Data flows strictly left to right:
 * (fragment) -> (translated fragment) -> (extracted instance) -> (canonical spec) -> (mapping result)
 *
 * IDs are derived, not generated: a fragment is identified by `${sourceFile}#${locator}` and an
 * extracted instance by `${fragmentId}::${ordinal}`, so a re-run over the same inputs reproduces
 * the same identifiers regardless of the order in which concurrent fragment work completes.
 *
 * Fragments and instances are immutable once produced. Canonical specs, mapping results and
 * reference records are derived values and can be recomputed wholesale from instances + slots.
 */

// --- Fragments ----------------------------------------------------------------

/** ISO 639-1 style language code ("en", "de", "zh"). `und` = undetermined. */
export type LanguageCode = string

/** A locatable unit of source text produced by a parsing adapter. */
export interface DocumentFragment {
    /** File name of the originating document */
    readonly sourceFile: string
    /** Page / slide / row identifier, e.g. "Page 3", "Slide 5", "Sheet: Optical!R12" */
    readonly locator: string
    readonly rawText: string
    /** Language reported by the parser, if it knows one */
    readonly detectedLanguage?: LanguageCode
}

/** Stable reference to a fragment, carried unmodified through every stage. */
export interface FragmentRef {
    readonly fragmentId: string
    readonly sourceFile: string
    readonly locator: string
}

export type TranslationStatus = 'native' | 'translated' | 'failed'

export const TRANSLATION_STATUSES: readonly TranslationStatus[] = ['native', 'translated', 'failed']

/**
 * Working-language view of a fragment. The original fragment is always retained;
 * when translation fails `translatedText` equals the original raw text.
 */
export interface TranslatedFragment {
    readonly fragment: DocumentFragment
    readonly ref: FragmentRef
    readonly sourceLanguage: LanguageCode
    readonly translatedText: string
    readonly translationStatus: TranslationStatus
    /** True when the translation was served from the shared cache */
    readonly fromCache: boolean
    /** Why translation failed, when `translationStatus` is `failed` */
    readonly failureDetail?: string
}

// --- Extraction ---------------------------------------------------------------

export interface ExtractedSpecInstance {
    readonly instanceId: string
    readonly fragmentRef: FragmentRef
    /** Position of the finding within its fragment's accepted response (0-based) */
    readonly ordinal: number
    readonly rawSpecName: string
    readonly value: number
    readonly unit: string
    readonly condition?: string
    /** Model-reported confidence in [0,1]; opaque, never recomputed locally */
    readonly confidence: number
    readonly sourceExcerpt: string
}

// --- Canonicalization ---------------------------------------------------------

/** How an instance's raw name was resolved to its standard name. */
export type TermResolution = 'table' | 'similarity' | 'non-standard'

export interface CanonicalSpec {
    readonly standardName: string
    readonly unitFamily: string
    /** Ordered by source file, locator, ordinal. Never empty. */
    readonly contributingInstances: readonly ExtractedSpecInstance[]
    readonly resolvedValue: number
    readonly resolvedUnit: string
    readonly resolvedCondition?: string
    /** Max confidence among contributing instances */
    readonly resolvedConfidence: number
    /** Instance the resolved value was taken from */
    readonly representativeInstanceId: string
    readonly resolution: TermResolution
    /** True when the name did not resolve to any entry of the canonical table */
    readonly nonStandard: boolean
}

// --- Template mapping ---------------------------------------------------------

/** Labeled cell position in the user-supplied template. Read-only to the pipeline. */
export interface TemplateSlot {
    readonly labelText: string
    /** A1-style coordinate of the value cell, e.g. "B5" */
    readonly cellCoordinate: string
    readonly expectedUnit?: string
}

export const UNMATCHED = 'unmatched' as const

export interface MappingResult {
    readonly standardName: string
    readonly slotRef: string | typeof UNMATCHED
    /** Score of the accepted slot, or the best score seen when unmatched */
    readonly similarityScore: number
}

export function isMapped(result: MappingResult): boolean {
    return result.slotRef !== UNMATCHED
}

// --- Provenance ---------------------------------------------------------------

export type ReferenceFlag = 'translation-failed' | 'non-standard-term' | 'similarity-resolved'

export interface ReferenceRecord {
    readonly standardName: string
    readonly instanceId: string
    readonly sourceFile: string
    readonly locator: string
    /** Original-language fragment text (never empty) */
    readonly originalText: string
    /** Working-language fragment text */
    readonly translatedText: string
    /** Snippet the model quoted as evidence */
    readonly sourceExcerpt: string
    readonly rawSpecName: string
    readonly value: number
    readonly unit: string
    readonly condition?: string
    readonly confidence: number
    readonly status: 'mapped' | typeof UNMATCHED
    readonly slotRef?: string
    readonly flags: readonly ReferenceFlag[]
}

// --- Identity helpers ---------------------------------------------------------

export function fragmentIdOf(fragment: Pick<DocumentFragment, 'sourceFile' | 'locator'>): string {
    return `${fragment.sourceFile}#${fragment.locator}`
}

export function fragmentRefOf(fragment: DocumentFragment): FragmentRef {
    return {
        fragmentId: fragmentIdOf(fragment),
        sourceFile: fragment.sourceFile,
        locator: fragment.locator
    }
}

export function instanceIdOf(fragmentId: string, ordinal: number): string {
    return `${fragmentId}::${ordinal}`
}

export function isTranslationStatus(value: string): value is TranslationStatus {
    return (TRANSLATION_STATUSES as readonly string[]).includes(value)
}
