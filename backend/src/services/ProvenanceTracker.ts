/**
 * Provenance Tracker
 *
 * One ReferenceRecord per contributing instance of every canonical spec, carrying the original
 * and translated fragment text, the locator and the mapped/unmatched status of its spec. Merging
 * never removes a record: a spec with three contributing instances yields three records.
 */
import {
    ProvenanceIntegrityError,
    UNMATCHED,
    type CanonicalSpec,
    type MappingResult,
    type ReferenceFlag,
    type ReferenceRecord,
    type TranslatedFragment
} from '@specmap/shared'
import { injectable } from 'inversify'
import type { InstanceResolution } from './TerminologyNormalizer.js'

@injectable()
export class ProvenanceTracker {
    /**
     * @param fragments - every fragment that went through language normalization, by fragment id
     * @param resolutions - per-instance term resolution, for the similarity flag
     */
    track(
        specs: readonly CanonicalSpec[],
        mappings: readonly MappingResult[],
        fragments: ReadonlyMap<string, TranslatedFragment>,
        resolutions: ReadonlyMap<string, InstanceResolution> = new Map()
    ): ReferenceRecord[] {
        const mappingByName = new Map(mappings.map((m) => [m.standardName, m]))
        const records: ReferenceRecord[] = []

        for (const spec of specs) {
            if (spec.contributingInstances.length === 0) {
                throw new ProvenanceIntegrityError(`Canonical spec ${spec.standardName} has no contributing instances`, '')
            }
            const mapping = mappingByName.get(spec.standardName)
            const slotRef = mapping && mapping.slotRef !== UNMATCHED ? mapping.slotRef : undefined

            for (const instance of spec.contributingInstances) {
                const fragmentId = instance.fragmentRef.fragmentId
                const source = fragments.get(fragmentId)
                if (!source) {
                    throw new ProvenanceIntegrityError(`Instance ${instance.instanceId} references unknown fragment ${fragmentId}`, fragmentId)
                }
                if (!source.fragment.rawText.trim()) {
                    throw new ProvenanceIntegrityError(`Fragment ${fragmentId} has no original text`, fragmentId)
                }

                const flags: ReferenceFlag[] = []
                if (source.translationStatus === 'failed') flags.push('translation-failed')
                if (spec.nonStandard) flags.push('non-standard-term')
                if (resolutions.get(instance.instanceId)?.resolution === 'similarity') flags.push('similarity-resolved')

                const record: ReferenceRecord = {
                    standardName: spec.standardName,
                    instanceId: instance.instanceId,
                    sourceFile: source.ref.sourceFile,
                    locator: source.ref.locator,
                    originalText: source.fragment.rawText,
                    translatedText: source.translatedText,
                    sourceExcerpt: instance.sourceExcerpt,
                    rawSpecName: instance.rawSpecName,
                    value: instance.value,
                    unit: instance.unit,
                    confidence: instance.confidence,
                    status: slotRef ? 'mapped' : UNMATCHED,
                    flags
                }
                records.push({
                    ...record,
                    ...(instance.condition ? { condition: instance.condition } : {}),
                    ...(slotRef ? { slotRef } : {})
                })
            }
        }

        return records
    }
}
