/**
 * Terminology Repository Interface
 *
 * The maintained canonical table: standard names, their unit families and known aliases in any
 * language. Lookups go through normalized term keys. Aliases learned during a run (similarity
 * fallback hits) are written back through `recordAlias`, an atomic upsert that never reassigns
 * an alias already owned by another standard name.
 */
import type { UnitFamily } from '@specmap/shared'

export interface StandardTerm {
    standardName: string
    unitFamily: UnitFamily
}

export interface TermLookup extends StandardTerm {
    /** True when the alias was learned during this process rather than shipped in the table */
    learned: boolean
}

export type RecordAliasResult = 'added' | 'exists' | 'conflict'

export interface ITerminologyRepository {
    findByAlias(name: string): Promise<TermLookup | null>

    /**
     * All standard terms, sorted by standard name.
     */
    listStandardTerms(): Promise<StandardTerm[]>

    /**
     * Standard name plus every alias (shipped and learned) of one term.
     */
    namesOf(standardName: string): Promise<string[]>

    recordAlias(alias: string, standardName: string): Promise<RecordAliasResult>
}
