/**
 * Template Mapper
 *
 * CanonicalSpec[] × TemplateSlot[] → one MappingResult per CanonicalSpec.
 *
 * Pair score: 1.0 when the slot label (unit suffix removed) equals the standard name or one of
 * its aliases; otherwise the configured similarity scorer. A pair whose units belong to two
 * different known families is not eligible.
 *
 * Assignment is greedy, best score first, accepting a pair only when score > threshold and
 * neither side is claimed yet. Order between equal scores: higher resolved confidence, then
 * standard name in natural order (case-insensitive, digit runs numeric, code units last), then
 * slot coordinate (row, column).
 */
import {
    compareCellCoordinates,
    compareNatural,
    normalizeTermKey,
    splitLabelUnit,
    TemplateValidationError,
    unitFamiliesConflict,
    unitFamilyOf,
    UNMATCHED,
    type CanonicalSpec,
    type MappingResult,
    type TemplateSlot
} from '@specmap/shared'
import { inject, injectable } from 'inversify'
import type { PipelineConfig } from '../config/pipelineConfig.js'
import { TOKENS } from '../di/tokens.js'
import type { ITerminologyRepository } from '../repos/terminologyRepository.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { ISimilarityScorer } from './similarityScorer.js'

export interface CandidatePair {
    spec: CanonicalSpec
    slot: TemplateSlot
    score: number
}

export function compareCandidatePairs(a: CandidatePair, b: CandidatePair): number {
    return (
        b.score - a.score ||
        b.spec.resolvedConfidence - a.spec.resolvedConfidence ||
        compareNatural(a.spec.standardName, b.spec.standardName) ||
        compareCellCoordinates(a.slot.cellCoordinate, b.slot.cellCoordinate)
    )
}

export function isUnitCompatible(spec: CanonicalSpec, slot: TemplateSlot): boolean {
    if (!slot.expectedUnit) return true
    return !unitFamiliesConflict(spec.unitFamily, unitFamilyOf(slot.expectedUnit))
}

/**
 * Slots must be non-empty with unique, valid A1 coordinates.
 */
export function validateTemplateSlots(slots: readonly TemplateSlot[]): void {
    const problems: string[] = []
    if (slots.length === 0) problems.push('template defines no slots')
    const seen = new Set<string>()
    for (const slot of slots) {
        const coordinate = slot.cellCoordinate.trim().toUpperCase()
        if (!/^[A-Z]+[1-9]\d*$/.test(coordinate)) {
            problems.push(`slot "${slot.labelText}" has invalid coordinate "${slot.cellCoordinate}"`)
            continue
        }
        if (seen.has(coordinate)) problems.push(`duplicate slot coordinate ${coordinate}`)
        seen.add(coordinate)
        if (!slot.labelText.trim()) problems.push(`slot ${coordinate} has an empty label`)
    }
    if (problems.length > 0) {
        throw new TemplateValidationError('Invalid output template', problems)
    }
}

@injectable()
export class TemplateMapper {
    constructor(
        @inject(TOKENS.TerminologyRepository) private readonly terminology: ITerminologyRepository,
        @inject(TOKENS.SimilarityScorer) private readonly scorer: ISimilarityScorer,
        @inject(TOKENS.PipelineConfig) private readonly config: PipelineConfig,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async map(specs: readonly CanonicalSpec[], slots: readonly TemplateSlot[]): Promise<MappingResult[]> {
        validateTemplateSlots(slots)

        const pairs: CandidatePair[] = []
        const bestScore = new Map<string, number>()
        for (const spec of specs) {
            for (const pair of await this.scoreSlots(spec, slots)) {
                pairs.push(pair)
                bestScore.set(spec.standardName, Math.max(bestScore.get(spec.standardName) ?? 0, pair.score))
            }
        }
        pairs.sort(compareCandidatePairs)

        const threshold = this.config.mappingThreshold
        const claimedSlots = new Set<string>()
        const assigned = new Map<string, CandidatePair>()
        for (const pair of pairs) {
            if (pair.score <= threshold) break
            if (assigned.has(pair.spec.standardName) || claimedSlots.has(pair.slot.cellCoordinate)) continue
            assigned.set(pair.spec.standardName, pair)
            claimedSlots.add(pair.slot.cellCoordinate)
        }

        return specs.map((spec) => {
            const pair = assigned.get(spec.standardName)
            if (pair) {
                this.telemetry.trackPipelineEventStrict('Mapping.Slot.Assigned', {
                    standardName: spec.standardName,
                    slot: pair.slot.cellCoordinate,
                    score: pair.score
                })
                return { standardName: spec.standardName, slotRef: pair.slot.cellCoordinate, similarityScore: pair.score }
            }
            const score = bestScore.get(spec.standardName) ?? 0
            this.telemetry.trackPipelineEventStrict('Mapping.Spec.Unmatched', { standardName: spec.standardName, bestScore: score })
            return { standardName: spec.standardName, slotRef: UNMATCHED, similarityScore: score }
        })
    }

    /**
     * Eligible (spec, slot) pairs with their scores.
     */
    async scoreSlots(spec: CanonicalSpec, slots: readonly TemplateSlot[]): Promise<CandidatePair[]> {
        const eligible = slots.filter((slot) => isUnitCompatible(spec, slot))
        if (eligible.length === 0) return []

        const nameKeys = new Set((await this.namesFor(spec)).map((name) => normalizeTermKey(name)))
        const labels = eligible.map((slot) => splitLabelUnit(slot.labelText).name)

        const pending: number[] = []
        const scores = labels.map<number>((label, index) => {
            if (nameKeys.has(normalizeTermKey(label))) return 1
            pending.push(index)
            return 0
        })

        for (const index of pending) {
            const [score] = await this.scorer.scoreAll(labels[index], [spec.standardName])
            scores[index] = score ?? 0
        }

        return eligible.map((slot, index) => ({ spec, slot, score: scores[index] }))
    }

    private async namesFor(spec: CanonicalSpec): Promise<string[]> {
        if (spec.nonStandard) {
            return [spec.standardName, ...spec.contributingInstances.map((i) => i.rawSpecName)]
        }
        return [spec.standardName, ...(await this.terminology.namesOf(spec.standardName))]
    }
}
