/**
 * Pipeline configuration loaded from environment variables.
 *
 * Every problem is collected before failing so a misconfigured run reports all of them at once.
 * Unset and empty variables take the defaults below.
 */
import { ConfigurationError } from '@specmap/shared'
import { z } from 'zod'

export const DEFAULT_WORKING_LANGUAGE = 'en'
export const DEFAULT_MAPPING_THRESHOLD = 0.75
export const DEFAULT_TERM_SIMILARITY_THRESHOLD = 0.85
export const DEFAULT_FRAGMENT_CONCURRENCY = 4
export const DEFAULT_LLM_MAX_CONCURRENT = 4
export const DEFAULT_LLM_MAX_REQUESTS_PER_MINUTE = 60
export const DEFAULT_RETRY_MAX_ATTEMPTS = 3
export const DEFAULT_RETRY_INITIAL_DELAY_MS = 1000
export const DEFAULT_RATE_LIMIT_MAX_WAITS = 5

export type SimilarityMode = 'lexical' | 'embedding'

export interface PipelineConfig {
    workingLanguage: string
    /** Template mapping acceptance threshold (strict `>`) */
    mappingThreshold: number
    /** Terminology similarity fallback acceptance threshold (strict `>`) */
    termSimilarityThreshold: number
    fragmentConcurrency: number
    llm: {
        maxConcurrent: number
        maxRequestsPerMinute: number
    }
    retry: {
        maxAttempts: number
        initialDelayMs: number
        rateLimitMaxWaits: number
    }
    /** Directory for the cross-run translation cache; undefined keeps the cache in memory */
    translationCacheDir?: string
    /** Empty list disables the relevance filter */
    relevanceKeywords: string[]
    similarity: SimilarityMode
    preflight: boolean
}

function blankToUndefined(value: unknown): unknown {
    return typeof value === 'string' && value.trim() === '' ? undefined : value
}

function envNumber(schema: z.ZodNumber, fallback: number) {
    return z.preprocess(blankToUndefined, z.coerce.number().pipe(schema).default(fallback))
}

const BOOLEAN_STRINGS = ['true', 'false', '1', '0', 'yes', 'no'] as const

const PipelineEnvSchema = z.object({
    SPECMAP_WORKING_LANGUAGE: z.preprocess(
        blankToUndefined,
        z
            .string()
            .trim()
            .regex(/^[A-Za-z]{2,3}$/, 'must be a two- or three-letter language code')
            .default(DEFAULT_WORKING_LANGUAGE)
            .transform((code) => code.toLowerCase())
    ),
    SPECMAP_MAPPING_THRESHOLD: envNumber(z.number().min(0).max(1), DEFAULT_MAPPING_THRESHOLD),
    SPECMAP_TERM_SIMILARITY_THRESHOLD: envNumber(z.number().min(0).max(1), DEFAULT_TERM_SIMILARITY_THRESHOLD),
    SPECMAP_FRAGMENT_CONCURRENCY: envNumber(z.number().int().min(1).max(64), DEFAULT_FRAGMENT_CONCURRENCY),
    SPECMAP_LLM_MAX_CONCURRENT: envNumber(z.number().int().min(1).max(64), DEFAULT_LLM_MAX_CONCURRENT),
    SPECMAP_LLM_MAX_REQUESTS_PER_MINUTE: envNumber(z.number().int().min(1), DEFAULT_LLM_MAX_REQUESTS_PER_MINUTE),
    SPECMAP_RETRY_MAX_ATTEMPTS: envNumber(z.number().int().min(1).max(10), DEFAULT_RETRY_MAX_ATTEMPTS),
    SPECMAP_RETRY_INITIAL_DELAY_MS: envNumber(z.number().int().min(0), DEFAULT_RETRY_INITIAL_DELAY_MS),
    SPECMAP_RATE_LIMIT_MAX_WAITS: envNumber(z.number().int().min(0), DEFAULT_RATE_LIMIT_MAX_WAITS),
    SPECMAP_TRANSLATION_CACHE_DIR: z.preprocess(blankToUndefined, z.string().trim().optional()),
    SPECMAP_RELEVANCE_KEYWORDS: z.preprocess(
        blankToUndefined,
        z
            .string()
            .default('')
            .transform((list) =>
                list
                    .split(',')
                    .map((keyword) => keyword.trim())
                    .filter(Boolean)
            )
    ),
    SPECMAP_SIMILARITY: z.preprocess(blankToUndefined, z.enum(['lexical', 'embedding']).default('lexical')),
    SPECMAP_PREFLIGHT: z.preprocess(
        (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
        z
            .enum(BOOLEAN_STRINGS)
            .default('false')
            .transform((flag) => flag === 'true' || flag === '1' || flag === 'yes')
    )
})

export function formatEnvIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(env)'}: ${issue.message}`)
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const parsed = PipelineEnvSchema.safeParse(env)
    if (!parsed.success) {
        throw new ConfigurationError('Invalid pipeline configuration', formatEnvIssues(parsed.error))
    }
    const e = parsed.data
    return {
        workingLanguage: e.SPECMAP_WORKING_LANGUAGE,
        mappingThreshold: e.SPECMAP_MAPPING_THRESHOLD,
        termSimilarityThreshold: e.SPECMAP_TERM_SIMILARITY_THRESHOLD,
        fragmentConcurrency: e.SPECMAP_FRAGMENT_CONCURRENCY,
        llm: {
            maxConcurrent: e.SPECMAP_LLM_MAX_CONCURRENT,
            maxRequestsPerMinute: e.SPECMAP_LLM_MAX_REQUESTS_PER_MINUTE
        },
        retry: {
            maxAttempts: e.SPECMAP_RETRY_MAX_ATTEMPTS,
            initialDelayMs: e.SPECMAP_RETRY_INITIAL_DELAY_MS,
            rateLimitMaxWaits: e.SPECMAP_RATE_LIMIT_MAX_WAITS
        },
        translationCacheDir: e.SPECMAP_TRANSLATION_CACHE_DIR,
        relevanceKeywords: e.SPECMAP_RELEVANCE_KEYWORDS,
        similarity: e.SPECMAP_SIMILARITY,
        preflight: e.SPECMAP_PREFLIGHT
    }
}
