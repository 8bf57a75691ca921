/**
 * Centralized Inversify tokens (string identifiers).
 *
 * Keeping them in one place reduces drift and typos across the container config
 * and @inject decorators.
 */
export const TOKENS = {
    // Core
    PipelineConfig: 'PipelineConfig',
    LlmProviderConfig: 'LlmProviderConfig',
    TelemetryClient: 'ITelemetryClient',
    Clock: 'IClock',
    LanguageProfiles: 'LanguageProfiles',

    // Repositories
    TranslationCacheRepository: 'ITranslationCacheRepository',
    TerminologyRepository: 'ITerminologyRepository',

    // LLM transport
    LlmClient: 'ILlmClient',
    EmbeddingClient: 'IEmbeddingClient',
    LlmCallGovernor: 'LlmCallGovernor',
    RetryPolicy: 'RetryPolicy',
    SimilarityScorer: 'ISimilarityScorer'
} as const

export type TokenName = keyof typeof TOKENS
export type TokenValue = (typeof TOKENS)[TokenName]
