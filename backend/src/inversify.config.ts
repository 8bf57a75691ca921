/**
 * Inversify Container Configuration
 *
 * Shared resources (translation cache, terminology table, call governor, telemetry) are
 * singletons so every concurrent fragment pipeline of a run sees the same instance. Component
 * services are bound to themselves and resolved per request.
 *
 * In test mode (NODE_ENV=test), uses NullTelemetryClient to prevent hanging.
 * Tests that need fakes construct services directly instead of going through this container.
 */
import 'reflect-metadata'
import { loadLanguageProfiles, SystemClock, type IClock, type LanguageProfileSet } from '@specmap/shared'
import type { Container } from 'inversify'
import type { LlmProviderConfig } from './config/llmProviderConfig.js'
import type { PipelineConfig } from './config/pipelineConfig.js'
import { TOKENS } from './di/tokens.js'
import { WorkbookWriter } from './output/WorkbookWriter.js'
import { SpecPipeline } from './pipeline/SpecPipeline.js'
import { MemoryTerminologyRepository } from './repos/terminologyRepository.memory.js'
import type { ITerminologyRepository } from './repos/terminologyRepository.js'
import { FileTranslationCacheRepository } from './repos/translationCacheRepository.file.js'
import { MemoryTranslationCacheRepository } from './repos/translationCacheRepository.memory.js'
import type { ITranslationCacheRepository } from './repos/translationCacheRepository.js'
import { DocumentRelevanceFilter } from './services/DocumentRelevanceFilter.js'
import { LanguageNormalizer } from './services/LanguageNormalizer.js'
import { LlmCallGovernor } from './services/LlmCallGovernor.js'
import { OpenAIChatClient, type IEmbeddingClient, type ILlmClient } from './services/llmClient.js'
import { LlmRequestExecutor } from './services/LlmRequestExecutor.js'
import { ProvenanceTracker } from './services/ProvenanceTracker.js'
import { RetryPolicy } from './services/RetryPolicy.js'
import { EmbeddingSimilarityScorer, LexicalSimilarityScorer, type ISimilarityScorer } from './services/similarityScorer.js'
import { SpecExtractionEngine } from './services/SpecExtractionEngine.js'
import { TemplateMapper } from './services/TemplateMapper.js'
import { TerminologyNormalizer } from './services/TerminologyNormalizer.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
import { TelemetryService } from './telemetry/TelemetryService.js'

export interface ContainerOverrides {
    /** Replaces the provider-backed client (both chat and embeddings) */
    llmClient?: ILlmClient & IEmbeddingClient
    terminology?: ITerminologyRepository
    translationCache?: ITranslationCacheRepository
}

export const setupContainer = async (
    container: Container,
    config: PipelineConfig,
    provider: LlmProviderConfig,
    overrides: ContainerOverrides = {}
): Promise<Container> => {
    container.bind<PipelineConfig>(TOKENS.PipelineConfig).toConstantValue(config)
    container.bind<LlmProviderConfig>(TOKENS.LlmProviderConfig).toConstantValue(provider)

    const isTestMode = process.env.NODE_ENV === 'test'

    // Register ITelemetryClient based on environment
    // CRITICAL: Never load real Application Insights in test mode (causes hanging)
    if (isTestMode) {
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).to(NullTelemetryClient).inSingletonScope()
    } else if (process.env.APPLICATIONINSIGHTS_CONNECTION_STRING) {
        const appInsightsModule = await import('applicationinsights')
        const appInsights = appInsightsModule.default
        if (!appInsights.defaultClient) {
            appInsights.setup(process.env.APPLICATIONINSIGHTS_CONNECTION_STRING).start()
        }
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(appInsights.defaultClient)
    } else {
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).to(NullTelemetryClient).inSingletonScope()
    }

    // Consistency policy: concrete services use class-based injection only (no string token).
    container.bind<TelemetryService>(TelemetryService).toSelf().inSingletonScope()

    container.bind<IClock>(TOKENS.Clock).toConstantValue(new SystemClock())
    container.bind<LanguageProfileSet>(TOKENS.LanguageProfiles).toConstantValue(await loadLanguageProfiles())

    // LLM transport
    const llmClient = overrides.llmClient ?? new OpenAIChatClient(provider)
    container.bind<ILlmClient>(TOKENS.LlmClient).toConstantValue(llmClient)
    container.bind<IEmbeddingClient>(TOKENS.EmbeddingClient).toConstantValue(llmClient)
    container.bind<RetryPolicy>(TOKENS.RetryPolicy).toConstantValue(
        new RetryPolicy({
            maxAttempts: config.retry.maxAttempts,
            initialDelayMs: config.retry.initialDelayMs,
            rateLimitMaxWaits: config.retry.rateLimitMaxWaits
        })
    )
    container
        .bind<LlmCallGovernor>(TOKENS.LlmCallGovernor)
        .toDynamicValue(
            (context) =>
                new LlmCallGovernor(
                    { maxConcurrent: config.llm.maxConcurrent, maxRequestsPerWindow: config.llm.maxRequestsPerMinute },
                    context.container.get<IClock>(TOKENS.Clock),
                    context.container.get(TelemetryService)
                )
        )
        .inSingletonScope()
    container.bind(LlmRequestExecutor).toSelf().inSingletonScope()

    // Shared repositories
    const translationCache =
        overrides.translationCache ??
        (config.translationCacheDir ? new FileTranslationCacheRepository(config.translationCacheDir) : new MemoryTranslationCacheRepository())
    container.bind<ITranslationCacheRepository>(TOKENS.TranslationCacheRepository).toConstantValue(translationCache)
    container
        .bind<ITerminologyRepository>(TOKENS.TerminologyRepository)
        .toConstantValue(overrides.terminology ?? (await MemoryTerminologyRepository.fromCanonicalTable()))

    container
        .bind<ISimilarityScorer>(TOKENS.SimilarityScorer)
        .toDynamicValue((context) =>
            config.similarity === 'embedding'
                ? new EmbeddingSimilarityScorer(context.container.get(LlmRequestExecutor))
                : new LexicalSimilarityScorer()
        )
        .inSingletonScope()

    // Pipeline components
    container.bind(LanguageNormalizer).toSelf().inSingletonScope()
    container.bind(SpecExtractionEngine).toSelf()
    container.bind(TerminologyNormalizer).toSelf()
    container.bind(TemplateMapper).toSelf()
    container.bind(ProvenanceTracker).toSelf()
    container.bind(DocumentRelevanceFilter).toSelf()
    container.bind(WorkbookWriter).toSelf()
    container.bind(SpecPipeline).toSelf()

    return container
}
