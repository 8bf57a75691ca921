/**
 * Terminology Normalizer
 *
 * ExtractedSpecInstance[] (all fragments) → CanonicalSpec[].
 *
 * Resolution per instance:
 * 1. exact/alias lookup in the canonical table
 * 2. similarity against the standard names, accepted only when score > threshold; the hit is
 *    written back as a learned alias
 * 3. otherwise a non-standard term named after the raw name
 *
 * Instances are processed in location order and every tie-break is total, so the result does
 * not depend on the order in which concurrent fragment work completed.
 */
import {
    compareInstancesByLocation,
    compareNatural,
    normalizeTermKey,
    unitFamiliesConflict,
    unitFamilyOf,
    type CanonicalSpec,
    type ExtractedSpecInstance,
    type TermResolution,
    type UnitFamily
} from '@specmap/shared'
import { inject, injectable } from 'inversify'
import type { PipelineConfig } from '../config/pipelineConfig.js'
import { TOKENS } from '../di/tokens.js'
import type { ITerminologyRepository, StandardTerm } from '../repos/terminologyRepository.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { ISimilarityScorer } from './similarityScorer.js'

export interface InstanceResolution {
    standardName: string
    resolution: TermResolution
    /** 1 for table hits, the similarity score for fallback hits, best score seen otherwise */
    score: number
    unitFamily: UnitFamily
}

export interface CanonicalizationResult {
    specs: CanonicalSpec[]
    /** Keyed by instance id */
    resolutions: ReadonlyMap<string, InstanceResolution>
}

const RESOLUTION_RANK: Record<TermResolution, number> = { table: 0, similarity: 1, 'non-standard': 2 }

/**
 * Representative instance of a merge group: highest confidence, earliest location on ties.
 * `instances` must already be in location order.
 */
export function pickRepresentative(instances: readonly ExtractedSpecInstance[]): ExtractedSpecInstance {
    if (instances.length === 0) {
        throw new Error('Cannot merge an empty instance group')
    }
    let best = instances[0]
    for (const instance of instances) {
        if (instance.confidence > best.confidence) best = instance
    }
    return best
}

@injectable()
export class TerminologyNormalizer {
    constructor(
        @inject(TOKENS.TerminologyRepository) private readonly terminology: ITerminologyRepository,
        @inject(TOKENS.SimilarityScorer) private readonly scorer: ISimilarityScorer,
        @inject(TOKENS.PipelineConfig) private readonly config: PipelineConfig,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * Resolve one raw name (with the unit it was reported in).
     */
    async resolveName(rawSpecName: string, unit: string): Promise<InstanceResolution> {
        const unitFamily = unitFamilyOf(unit)

        const hit = await this.terminology.findByAlias(rawSpecName)
        if (hit) {
            return {
                standardName: hit.standardName,
                // A learned alias records an earlier similarity decision
                resolution: hit.learned ? 'similarity' : 'table',
                score: 1,
                unitFamily: hit.unitFamily === 'unknown' ? unitFamily : hit.unitFamily
            }
        }

        const { best, score } = await this.bestSimilarTerm(rawSpecName, unitFamily)
        if (best && score > this.config.termSimilarityThreshold) {
            const recorded = await this.terminology.recordAlias(rawSpecName, best.standardName)
            if (recorded === 'added') {
                this.telemetry.trackPipelineEventStrict('Terminology.Alias.Learned', {
                    alias: rawSpecName,
                    standardName: best.standardName,
                    score
                })
            }
            return {
                standardName: best.standardName,
                resolution: 'similarity',
                score,
                unitFamily: best.unitFamily === 'unknown' ? unitFamily : best.unitFamily
            }
        }

        return { standardName: rawSpecName.trim(), resolution: 'non-standard', score, unitFamily }
    }

    async canonicalize(instances: readonly ExtractedSpecInstance[]): Promise<CanonicalizationResult> {
        const ordered = [...instances].sort(compareInstancesByLocation)
        const resolutions = new Map<string, InstanceResolution>()
        const groups = new Map<string, { resolutions: InstanceResolution[]; instances: ExtractedSpecInstance[] }>()

        for (const instance of ordered) {
            const resolved = await this.resolveName(instance.rawSpecName, instance.unit)
            resolutions.set(instance.instanceId, resolved)

            const groupKey =
                resolved.resolution === 'non-standard'
                    ? `raw:${normalizeTermKey(instance.rawSpecName) || instance.rawSpecName.trim()}`
                    : `std:${resolved.standardName}`
            const group = groups.get(groupKey) ?? { resolutions: [], instances: [] }
            group.resolutions.push(resolved)
            group.instances.push(instance)
            groups.set(groupKey, group)
        }

        const specs: CanonicalSpec[] = []
        for (const group of groups.values()) {
            const spec = this.merge(group.instances, group.resolutions)
            if (spec.nonStandard) {
                this.telemetry.trackPipelineEventStrict('Terminology.Term.NonStandard', {
                    rawSpecName: spec.standardName,
                    instances: spec.contributingInstances.length
                })
            }
            specs.push(spec)
        }
        specs.sort((a, b) => compareNatural(a.standardName, b.standardName))

        this.telemetry.trackPipelineEventStrict('Terminology.Canonical.Built', {
            instances: ordered.length,
            canonicalSpecs: specs.length,
            nonStandard: specs.filter((s) => s.nonStandard).length
        })

        return { specs, resolutions }
    }

    private merge(instances: readonly ExtractedSpecInstance[], resolutions: readonly InstanceResolution[]): CanonicalSpec {
        const representative = pickRepresentative(instances)
        const resolution = resolutions.reduce<TermResolution>(
            (acc, r) => (RESOLUTION_RANK[r.resolution] < RESOLUTION_RANK[acc] ? r.resolution : acc),
            'non-standard'
        )
        const nonStandard = resolution === 'non-standard'
        const standardName = nonStandard ? instances[0].rawSpecName.trim() : resolutions[0].standardName
        const termFamily = resolutions.find((r) => r.unitFamily !== 'unknown')?.unitFamily
        const spec: CanonicalSpec = {
            standardName,
            unitFamily: termFamily ?? unitFamilyOf(representative.unit),
            contributingInstances: instances,
            resolvedValue: representative.value,
            resolvedUnit: representative.unit,
            resolvedConfidence: representative.confidence,
            representativeInstanceId: representative.instanceId,
            resolution,
            nonStandard
        }
        return representative.condition ? { ...spec, resolvedCondition: representative.condition } : spec
    }

    private async bestSimilarTerm(rawSpecName: string, unitFamily: UnitFamily): Promise<{ best?: StandardTerm; score: number }> {
        const terms = (await this.terminology.listStandardTerms()).filter(
            (term) => !unitFamiliesConflict(term.unitFamily, unitFamily)
        )
        if (terms.length === 0) return { score: 0 }

        const scores = await this.scorer.scoreAll(
            rawSpecName,
            terms.map((t) => t.standardName)
        )
        let bestIndex = -1
        let bestScore = 0
        scores.forEach((score, index) => {
            // Terms are sorted by name, so the first of equal scores wins
            if (score > bestScore) {
                bestScore = score
                bestIndex = index
            }
        })
        return bestIndex === -1 ? { score: 0 } : { best: terms[bestIndex], score: bestScore }
    }
}
