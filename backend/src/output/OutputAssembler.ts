/**
 * Output Assembler
 *
 * Turns mapping results, canonical specs and reference records into the data the workbook writer
 * lays out: populated slots with annotation text and confidence band, the reference table, the
 * unmatched table and the run summary. Pure data; no spreadsheet types appear here.
 */
import {
    confidenceBandOf,
    compareCellCoordinates,
    formatConfidence,
    ProvenanceIntegrityError,
    UNMATCHED,
    type CanonicalSpec,
    type ConfidenceBand,
    type MappingResult,
    type ReferenceRecord,
    type TemplateSlot
} from '@specmap/shared'
import type { RunIssue } from '../pipeline/RunIssueLog.js'

export const ANNOTATION_EXCERPT_LENGTH = 200

export interface PopulatedSlot {
    slot: TemplateSlot
    standardName: string
    /** Number when the slot label carries the unit, "value unit" text otherwise */
    cellValue: number | string
    confidence: number
    band: ConfidenceBand
    annotation: string
    similarityScore: number
}

export interface UnmatchedRow {
    standardName: string
    value: number
    unit: string
    condition?: string
    confidence: number
    bestScore: number
    nonStandard: boolean
    sources: string[]
}

export interface RunSummary {
    fragments: number
    nativeFragments: number
    translatedFragments: number
    failedTranslations: number
    failedExtractions: number
    filteredDocuments: number
    instances: number
    canonicalSpecs: number
    mapped: number
    unmatched: number
    emptySlots: number
    issues: RunIssue[]
}

export interface AssembledOutput {
    populated: PopulatedSlot[]
    emptySlots: TemplateSlot[]
    references: ReferenceRecord[]
    unmatched: UnmatchedRow[]
    summary: RunSummary
}

export type RunCounts = Omit<RunSummary, 'canonicalSpecs' | 'mapped' | 'unmatched' | 'emptySlots' | 'issues'>

export function formatCellValue(spec: CanonicalSpec, slot: TemplateSlot): number | string {
    if (slot.expectedUnit) return spec.resolvedValue
    return spec.resolvedUnit ? `${spec.resolvedValue} ${spec.resolvedUnit}` : spec.resolvedValue
}

/**
 * Note text attached to a populated cell.
 */
export function buildAnnotation(record: ReferenceRecord): string {
    const lines = [
        `Source: ${record.sourceFile}`,
        `Location: ${record.locator}`,
        `Original: ${record.originalText.slice(0, ANNOTATION_EXCERPT_LENGTH)}`
    ]
    if (record.translatedText !== record.originalText) {
        lines.push(`Translated: ${record.translatedText.slice(0, ANNOTATION_EXCERPT_LENGTH)}`)
    }
    if (record.flags.includes('translation-failed')) {
        lines.push('Translation failed: value read from the original text')
    }
    lines.push(`Confidence: ${formatConfidence(record.confidence)}`)
    return lines.join('\n')
}

export function assembleOutput(
    specs: readonly CanonicalSpec[],
    mappings: readonly MappingResult[],
    slots: readonly TemplateSlot[],
    references: readonly ReferenceRecord[],
    counts: RunCounts,
    issues: readonly RunIssue[]
): AssembledOutput {
    const specByName = new Map(specs.map((s) => [s.standardName, s]))
    const slotByCoordinate = new Map(slots.map((s) => [s.cellCoordinate, s]))
    const recordById = new Map(references.map((r) => [r.instanceId, r]))

    const populated: PopulatedSlot[] = []
    const unmatched: UnmatchedRow[] = []

    for (const mapping of mappings) {
        const spec = specByName.get(mapping.standardName)
        if (!spec) {
            throw new ProvenanceIntegrityError(`Mapping refers to unknown canonical spec ${mapping.standardName}`, '')
        }

        if (mapping.slotRef === UNMATCHED) {
            const row: UnmatchedRow = {
                standardName: spec.standardName,
                value: spec.resolvedValue,
                unit: spec.resolvedUnit,
                confidence: spec.resolvedConfidence,
                bestScore: mapping.similarityScore,
                nonStandard: spec.nonStandard,
                sources: [...new Set(spec.contributingInstances.map((i) => `${i.fragmentRef.sourceFile} (${i.fragmentRef.locator})`))]
            }
            unmatched.push(spec.resolvedCondition ? { ...row, condition: spec.resolvedCondition } : row)
            continue
        }

        const slot = slotByCoordinate.get(mapping.slotRef)
        const record = recordById.get(spec.representativeInstanceId)
        if (!slot) {
            throw new ProvenanceIntegrityError(`Mapping refers to unknown slot ${mapping.slotRef}`, '')
        }
        if (!record) {
            throw new ProvenanceIntegrityError(
                `No reference record for ${spec.standardName} (${spec.representativeInstanceId})`,
                spec.contributingInstances[0]?.fragmentRef.fragmentId ?? ''
            )
        }

        populated.push({
            slot,
            standardName: spec.standardName,
            cellValue: formatCellValue(spec, slot),
            confidence: spec.resolvedConfidence,
            band: confidenceBandOf(spec.resolvedConfidence),
            annotation: buildAnnotation(record),
            similarityScore: mapping.similarityScore
        })
    }

    populated.sort((a, b) => compareCellCoordinates(a.slot.cellCoordinate, b.slot.cellCoordinate))
    const claimed = new Set(populated.map((p) => p.slot.cellCoordinate))
    const emptySlots = slots.filter((slot) => !claimed.has(slot.cellCoordinate))

    return {
        populated,
        emptySlots,
        references: [...references],
        unmatched,
        summary: {
            ...counts,
            canonicalSpecs: specs.length,
            mapped: populated.length,
            unmatched: unmatched.length,
            emptySlots: emptySlots.length,
            issues: [...issues]
        }
    }
}
