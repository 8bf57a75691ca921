/**
 * In-Memory Terminology Repository
 *
 * Seeded from the canonical terminology table. Node runs each upsert to completion before
 * another starts, so `recordAlias` is atomic without further locking.
 */
import { compareNatural, loadCanonicalTerms, normalizeTermKey, type CanonicalTerm } from '@specmap/shared'
import { injectable } from 'inversify'
import { BaseMemoryRepository } from './base/BaseMemoryRepository.js'
import type { ITerminologyRepository, RecordAliasResult, StandardTerm, TermLookup } from './terminologyRepository.js'

interface AliasRecord {
    standardName: string
    label: string
    learned: boolean
}

@injectable()
export class MemoryTerminologyRepository extends BaseMemoryRepository<AliasRecord> implements ITerminologyRepository {
    private readonly terms = new Map<string, StandardTerm>()

    constructor(terms: readonly CanonicalTerm[]) {
        super()
        for (const term of terms) {
            this.terms.set(term.standardName, { standardName: term.standardName, unitFamily: term.unitFamily })
            for (const label of [term.standardName, ...term.aliases]) {
                this.storeIfAbsent(label, { standardName: term.standardName, label, learned: false })
            }
        }
    }

    protected override keyOf(raw: string): string {
        return normalizeTermKey(raw)
    }

    static async fromCanonicalTable(path?: string): Promise<MemoryTerminologyRepository> {
        return new MemoryTerminologyRepository(await loadCanonicalTerms(path))
    }

    async findByAlias(name: string): Promise<TermLookup | null> {
        const record = this.lookup(name)
        if (!record) return null
        const term = this.terms.get(record.standardName)
        if (!term) return null
        return { ...term, learned: record.learned }
    }

    async listStandardTerms(): Promise<StandardTerm[]> {
        return [...this.terms.values()].sort((a, b) => compareNatural(a.standardName, b.standardName))
    }

    async namesOf(standardName: string): Promise<string[]> {
        const names: string[] = []
        for (const record of this.storedValues()) {
            if (record.standardName === standardName) names.push(record.label)
        }
        return names
    }

    async recordAlias(alias: string, standardName: string): Promise<RecordAliasResult> {
        if (!this.terms.has(standardName)) {
            throw new Error(`Cannot record alias for unknown standard name ${standardName}`)
        }
        if (this.storeIfAbsent(alias, { standardName, label: alias, learned: true })) return 'added'
        const existing = this.lookup(alias)
        return existing?.standardName === standardName ? 'exists' : 'conflict'
    }

    /**
     * Learned aliases (for testing and run summaries).
     */
    learnedAliases(): Array<{ alias: string; standardName: string }> {
        return this.storedValues()
            .filter((r) => r.learned)
            .map((r) => ({ alias: r.label, standardName: r.standardName }))
    }
}
