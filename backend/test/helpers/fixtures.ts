import {
    fragmentIdOf,
    fragmentRefOf,
    instanceIdOf,
    unitFamilyOf,
    type CanonicalSpec,
    type DocumentFragment,
    type ExtractedSpecInstance,
    type TranslatedFragment,
    type TranslationStatus
} from '@specmap/shared'
import type { ISimilarityScorer } from '../../src/services/similarityScorer.js'

export interface InstanceInput {
    file?: string
    locator: string
    ordinal?: number
    name: string
    value: number
    unit: string
    confidence: number
    condition?: string
}

export function instance(input: InstanceInput): ExtractedSpecInstance {
    const sourceFile = input.file ?? 'vendor-a.pdf'
    const fragmentId = fragmentIdOf({ sourceFile, locator: input.locator })
    const ordinal = input.ordinal ?? 0
    return {
        instanceId: instanceIdOf(fragmentId, ordinal),
        fragmentRef: { fragmentId, sourceFile, locator: input.locator },
        ordinal,
        rawSpecName: input.name,
        value: input.value,
        unit: input.unit,
        confidence: input.confidence,
        sourceExcerpt: `${input.name}: ${input.value} ${input.unit}`,
        ...(input.condition ? { condition: input.condition } : {})
    }
}

/**
 * Canonical spec over the given instances, represented by the first one.
 */
export function canonicalSpec(
    standardName: string,
    instances: readonly ExtractedSpecInstance[],
    options: { nonStandard?: boolean } = {}
): CanonicalSpec {
    const [representative] = instances
    const nonStandard = options.nonStandard ?? false
    return {
        standardName,
        unitFamily: unitFamilyOf(representative.unit),
        contributingInstances: instances,
        resolvedValue: representative.value,
        resolvedUnit: representative.unit,
        resolvedConfidence: Math.max(...instances.map((i) => i.confidence)),
        representativeInstanceId: representative.instanceId,
        resolution: nonStandard ? 'non-standard' : 'table',
        nonStandard
    }
}

export function translated(
    fragment: DocumentFragment,
    translatedText: string,
    translationStatus: TranslationStatus = 'translated'
): TranslatedFragment {
    return {
        fragment,
        ref: fragmentRefOf(fragment),
        sourceLanguage: translationStatus === 'native' ? 'en' : 'de',
        translatedText,
        translationStatus,
        fromCache: false
    }
}

/**
 * Scorer that gives every pair the same score.
 */
export function fixedScorer(score: number): ISimilarityScorer {
    return {
        kind: 'lexical',
        scoreAll: async (_text, candidates) => candidates.map(() => score)
    }
}
