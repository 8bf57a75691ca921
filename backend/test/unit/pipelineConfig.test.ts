import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { ConfigurationError } from '@specmap/shared'
import { loadLlmProviderConfig } from '../../src/config/llmProviderConfig.js'
import { loadPipelineConfig } from '../../src/config/pipelineConfig.js'

describe('loadPipelineConfig', () => {
    test('empty environment yields defaults', () => {
        const config = loadPipelineConfig({})
        assert.equal(config.workingLanguage, 'en')
        assert.equal(config.mappingThreshold, 0.75)
        assert.equal(config.termSimilarityThreshold, 0.85)
        assert.equal(config.fragmentConcurrency, 4)
        assert.deepEqual(config.llm, { maxConcurrent: 4, maxRequestsPerMinute: 60 })
        assert.deepEqual(config.retry, { maxAttempts: 3, initialDelayMs: 1000, rateLimitMaxWaits: 5 })
        assert.equal(config.translationCacheDir, undefined)
        assert.deepEqual(config.relevanceKeywords, [])
        assert.equal(config.similarity, 'lexical')
        assert.equal(config.preflight, false)
    })

    test('reads and normalizes overrides', () => {
        const config = loadPipelineConfig({
            SPECMAP_WORKING_LANGUAGE: 'DE',
            SPECMAP_MAPPING_THRESHOLD: '0.6',
            SPECMAP_FRAGMENT_CONCURRENCY: '8',
            SPECMAP_RELEVANCE_KEYWORDS: ' luminance, cover glass ,,',
            SPECMAP_TRANSLATION_CACHE_DIR: '/tmp/specmap-cache',
            SPECMAP_SIMILARITY: 'embedding',
            SPECMAP_PREFLIGHT: 'YES'
        })
        assert.equal(config.workingLanguage, 'de')
        assert.equal(config.mappingThreshold, 0.6)
        assert.equal(config.fragmentConcurrency, 8)
        assert.deepEqual(config.relevanceKeywords, ['luminance', 'cover glass'])
        assert.equal(config.translationCacheDir, '/tmp/specmap-cache')
        assert.equal(config.similarity, 'embedding')
        assert.equal(config.preflight, true)
    })

    test('blank values fall back to defaults', () => {
        const config = loadPipelineConfig({ SPECMAP_MAPPING_THRESHOLD: '  ', SPECMAP_WORKING_LANGUAGE: '' })
        assert.equal(config.mappingThreshold, 0.75)
        assert.equal(config.workingLanguage, 'en')
    })

    test('collects every problem into one ConfigurationError', () => {
        assert.throws(
            () =>
                loadPipelineConfig({
                    SPECMAP_MAPPING_THRESHOLD: '1.5',
                    SPECMAP_FRAGMENT_CONCURRENCY: 'many',
                    SPECMAP_SIMILARITY: 'semantic'
                }),
            (error: unknown) => {
                assert.ok(error instanceof ConfigurationError)
                assert.equal(error.problems.length, 3)
                assert.ok(error.problems.some((p) => p.startsWith('SPECMAP_MAPPING_THRESHOLD: ')))
                assert.ok(error.problems.some((p) => p.startsWith('SPECMAP_FRAGMENT_CONCURRENCY: ')))
                assert.ok(error.problems.some((p) => p.startsWith('SPECMAP_SIMILARITY: ')))
                assert.ok(error.message.startsWith('Invalid pipeline configuration: '))
                return true
            }
        )
    })
})

describe('loadLlmProviderConfig', () => {
    test('OpenAI key selects the OpenAI provider with default models', () => {
        const provider = loadLlmProviderConfig({ OPENAI_API_KEY: 'test-key' })
        assert.equal(provider.kind, 'openai')
        if (provider.kind !== 'openai') return
        assert.equal(provider.apiKey, 'test-key')
        assert.equal(provider.model, 'gpt-4o-mini')
        assert.equal(provider.embeddingModel, 'text-embedding-3-small')
    })

    test('Azure endpoint and deployment select the Azure provider', () => {
        const provider = loadLlmProviderConfig({
            AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com/',
            AZURE_OPENAI_MODEL: 'spec-extractor'
        })
        assert.equal(provider.kind, 'azure')
        if (provider.kind !== 'azure') return
        assert.equal(provider.model, 'spec-extractor')
        assert.equal(provider.apiVersion, '2024-10-21')
    })

    test('missing credentials are a configuration error', () => {
        assert.throws(() => loadLlmProviderConfig({}), (error: unknown) => {
            assert.ok(error instanceof ConfigurationError)
            assert.ok(error.message.startsWith('No LLM provider configured'))
            return true
        })
    })

    test('Azure endpoint without a deployment is incomplete', () => {
        assert.throws(() => loadLlmProviderConfig({ AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com/' }), (error: unknown) => {
            assert.ok(error instanceof ConfigurationError)
            assert.ok(error.message.startsWith('Incomplete Azure OpenAI configuration'))
            return true
        })
    })
})
