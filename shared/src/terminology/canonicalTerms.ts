/**
 * Canonical terminology table loader.
 *
 * The seed table ships as `shared/data/canonical-terms.json`. Each entry names a standard spec,
 * its unit family and the aliases (any language) that resolve to it. The table is validated on
 * load; an alias claimed by two different standard names is a configuration error.
 */
import { readFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigurationError } from '../exceptions/pipelineExceptions.js'
import { normalizeTermKey } from './termKey.js'
import type { UnitFamily } from './unitFamilies.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const DEFAULT_CANONICAL_TERMS_PATH = join(__dirname, '..', '..', 'data', 'canonical-terms.json')

const UNIT_FAMILIES = [
    'luminance',
    'ratio',
    'length',
    'pressure',
    'percent',
    'angle',
    'temperature',
    'hardness',
    'time',
    'power',
    'voltage',
    'frequency',
    'pixel-density',
    'unknown'
] as const satisfies readonly UnitFamily[]

export const CanonicalTermSchema = z.object({
    standardName: z.string().trim().min(1),
    unitFamily: z.enum(UNIT_FAMILIES),
    aliases: z.array(z.string().trim().min(1)).default([])
})
export type CanonicalTerm = z.infer<typeof CanonicalTermSchema>

export const CanonicalTermTableSchema = z.object({
    version: z.number().int().positive(),
    terms: z.array(CanonicalTermSchema).min(1)
})
export type CanonicalTermTable = z.infer<typeof CanonicalTermTableSchema>

/**
 * Validate a parsed table. Returns the list of problems (empty when the table is usable).
 */
export function validateCanonicalTerms(terms: readonly CanonicalTerm[]): string[] {
    const problems: string[] = []
    const owners = new Map<string, string>()
    for (const term of terms) {
        for (const label of [term.standardName, ...term.aliases]) {
            const key = normalizeTermKey(label)
            if (!key) {
                problems.push(`"${label}" (${term.standardName}) normalizes to an empty key`)
                continue
            }
            const owner = owners.get(key)
            if (owner !== undefined && owner !== term.standardName) {
                problems.push(`"${label}" is claimed by both ${owner} and ${term.standardName}`)
                continue
            }
            owners.set(key, term.standardName)
        }
    }
    return problems
}

export function parseCanonicalTerms(payload: unknown): CanonicalTerm[] {
    const parsed = CanonicalTermTableSchema.safeParse(payload)
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid canonical terminology table',
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        )
    }
    const problems = validateCanonicalTerms(parsed.data.terms)
    if (problems.length > 0) {
        throw new ConfigurationError('Conflicting canonical terminology aliases', problems)
    }
    return parsed.data.terms
}

export async function loadCanonicalTerms(path: string = DEFAULT_CANONICAL_TERMS_PATH): Promise<CanonicalTerm[]> {
    let content: string
    try {
        content = await readFile(path, 'utf-8')
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        throw new ConfigurationError(`Cannot read canonical terminology table at ${path}`, [detail])
    }
    let payload: unknown
    try {
        payload = JSON.parse(content)
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        throw new ConfigurationError(`Canonical terminology table at ${path} is not valid JSON`, [detail])
    }
    return parseCanonicalTerms(payload)
}
