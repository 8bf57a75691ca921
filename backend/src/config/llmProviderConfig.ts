/**
 * LLM provider credentials.
 *
 * Either OpenAI (API key) or Azure OpenAI (endpoint + deployment, Managed Identity via
 * DefaultAzureCredential). A run without either aborts before any fragment work starts.
 *
 * Environment:
 * - OPENAI_API_KEY, OPENAI_BASE_URL (optional), OPENAI_MODEL, OPENAI_EMBEDDING_MODEL
 * - AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_MODEL, AZURE_OPENAI_API_VERSION, AZURE_OPENAI_EMBEDDING_MODEL
 */
import { ConfigurationError } from '@specmap/shared'

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini'
export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small'
export const DEFAULT_AZURE_OPENAI_API_VERSION = '2024-10-21'

export interface OpenAIProviderConfig {
    kind: 'openai'
    apiKey: string
    baseUrl?: string
    model: string
    embeddingModel: string
}

export interface AzureOpenAIProviderConfig {
    kind: 'azure'
    endpoint: string
    model: string
    apiVersion: string
    embeddingModel?: string
}

export type LlmProviderConfig = OpenAIProviderConfig | AzureOpenAIProviderConfig

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name]?.trim()
    return value ? value : undefined
}

export function loadLlmProviderConfig(env: NodeJS.ProcessEnv = process.env): LlmProviderConfig {
    const apiKey = envValue(env, 'OPENAI_API_KEY')
    if (apiKey) {
        return {
            kind: 'openai',
            apiKey,
            baseUrl: envValue(env, 'OPENAI_BASE_URL'),
            model: envValue(env, 'OPENAI_MODEL') ?? DEFAULT_OPENAI_MODEL,
            embeddingModel: envValue(env, 'OPENAI_EMBEDDING_MODEL') ?? DEFAULT_OPENAI_EMBEDDING_MODEL
        }
    }

    const endpoint = envValue(env, 'AZURE_OPENAI_ENDPOINT')
    if (endpoint) {
        const model = envValue(env, 'AZURE_OPENAI_MODEL')
        if (!model) {
            throw new ConfigurationError('Incomplete Azure OpenAI configuration', ['AZURE_OPENAI_MODEL is required'])
        }
        if (!/^https:\/\//.test(endpoint)) {
            throw new ConfigurationError('Incomplete Azure OpenAI configuration', ['AZURE_OPENAI_ENDPOINT must be an https URL'])
        }
        return {
            kind: 'azure',
            endpoint,
            model,
            apiVersion: envValue(env, 'AZURE_OPENAI_API_VERSION') ?? DEFAULT_AZURE_OPENAI_API_VERSION,
            embeddingModel: envValue(env, 'AZURE_OPENAI_EMBEDDING_MODEL')
        }
    }

    throw new ConfigurationError('No LLM provider configured', [
        'set OPENAI_API_KEY, or AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_MODEL'
    ])
}
