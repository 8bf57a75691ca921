// reflect-metadata MUST be imported first for InversifyJS decorator metadata to work
import 'reflect-metadata'
import { Container } from 'inversify'
import { loadLlmProviderConfig } from './config/llmProviderConfig.js'
import { loadPipelineConfig } from './config/pipelineConfig.js'
import { setupContainer, type ContainerOverrides } from './inversify.config.js'
import { SpecPipeline } from './pipeline/SpecPipeline.js'

export * from './config/llmProviderConfig.js'
export * from './config/pipelineConfig.js'
export { TOKENS } from './di/tokens.js'
export { setupContainer, type ContainerOverrides } from './inversify.config.js'
export * from './output/OutputAssembler.js'
export * from './output/WorkbookWriter.js'
export * from './pipeline/RunIssueLog.js'
export * from './pipeline/SpecPipeline.js'
export type { ITerminologyRepository, StandardTerm, TermLookup } from './repos/terminologyRepository.js'
export { MemoryTerminologyRepository } from './repos/terminologyRepository.memory.js'
export type { ITranslationCacheRepository, TranslationCacheEntry } from './repos/translationCacheRepository.js'
export { FileTranslationCacheRepository } from './repos/translationCacheRepository.file.js'
export { MemoryTranslationCacheRepository } from './repos/translationCacheRepository.memory.js'
export type { ILlmClient, IEmbeddingClient, LlmCallResult, LlmCompleteOptions } from './services/llmClient.js'
export { OpenAIChatClient, NullLlmClient } from './services/llmClient.js'
export type { RelevanceDecision } from './services/DocumentRelevanceFilter.js'
export type { FragmentExtraction } from './services/SpecExtractionEngine.js'
export type { CanonicalizationResult, InstanceResolution } from './services/TerminologyNormalizer.js'
export { readTemplateSlots } from './template/TemplateReader.js'

/**
 * Build a pipeline from environment configuration.
 *
 * @throws ConfigurationError when settings are invalid or no LLM provider is configured
 */
export async function createSpecPipeline(env: NodeJS.ProcessEnv = process.env, overrides: ContainerOverrides = {}): Promise<SpecPipeline> {
    const config = loadPipelineConfig(env)
    const provider = loadLlmProviderConfig(env)
    const container = await setupContainer(new Container(), config, provider, overrides)
    return container.get(SpecPipeline)
}
