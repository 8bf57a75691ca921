/**
 * LLM Client
 *
 * Chat completions against OpenAI or Azure OpenAI (Managed Identity via DefaultAzureCredential).
 *
 * The client never throws: every call returns bounded diagnostics with an outcome of
 * `success | rate-limited | timeout | error | empty`. Retry decisions belong to the caller
 * (LlmRequestExecutor); SDK-level retries are disabled so a 429 surfaces as `rate-limited`
 * with the provider's retry-after hint.
 */

import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity'
import type { ChatMessage } from '@specmap/shared'
import { injectable } from 'inversify'
import OpenAI, { APIConnectionTimeoutError, APIError, APIUserAbortError, AzureOpenAI } from 'openai'
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming, ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import type { CreateEmbeddingResponse, EmbeddingCreateParams } from 'openai/resources/embeddings'
import type { LlmProviderConfig } from '../config/llmProviderConfig.js'

export interface LlmCompleteOptions {
    messages: ChatMessage[]
    maxTokens?: number
    temperature?: number
    timeoutMs?: number
    /** Ask the provider for a JSON object response */
    jsonMode?: boolean
}

export type LlmCallOutcome = 'success' | 'rate-limited' | 'timeout' | 'error' | 'empty'

export interface LlmCallDiagnostics {
    outcome: LlmCallOutcome
    httpStatus?: number
    errorCode?: string
    errorType?: string
    errorName?: string
    // Not used for low-cardinality dashboards; available for exception/debug only.
    errorMessage?: string
    /** Provider retry hint for rate-limited calls */
    retryAfterMs?: number
}

export interface LlmCompletion {
    content: string
    tokenUsage: {
        prompt: number
        completion: number
        total: number
    }
}

export interface LlmCallResult {
    result: LlmCompletion | null
    diagnostics: LlmCallDiagnostics
}

export interface ILlmClient {
    /**
     * @throws Never - failures are reported through diagnostics
     */
    complete(options: LlmCompleteOptions): Promise<LlmCallResult>

    /**
     * Minimal request verifying credentials and connectivity
     */
    healthCheck(): Promise<boolean>
}

export interface LlmEmbeddingResult {
    /** One vector per input text, in input order; null unless the outcome is success */
    vectors: number[][] | null
    diagnostics: LlmCallDiagnostics
}

export interface IEmbeddingClient {
    /** False when no embedding model is configured; callers then score lexically */
    embeddingsAvailable(): boolean

    /**
     * @throws Never - failures are reported through diagnostics
     */
    embed(texts: readonly string[]): Promise<LlmEmbeddingResult>
}

/**
 * No-op client for environments without a provider. Never throws.
 */
@injectable()
export class NullLlmClient implements ILlmClient {
    async complete(): Promise<LlmCallResult> {
        return {
            result: null,
            diagnostics: {
                outcome: 'error',
                errorName: 'NullLlmClient',
                errorCode: 'not-configured'
            }
        }
    }

    async healthCheck(): Promise<boolean> {
        return false
    }
}

const DEFAULT_TIMEOUT_MS = 60_000

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'assistant':
            return { role: 'assistant', content: message.content }
        case 'user':
            return { role: 'user', content: message.content }
    }
}

/**
 * Parse a retry-after hint: `retry-after-ms`, or `retry-after` as seconds or an HTTP date.
 */
export function parseRetryAfterMs(headers: Record<string, string | null | undefined> | undefined, nowMs: number): number | undefined {
    if (!headers) return undefined
    const ms = headers['retry-after-ms']
    if (ms) {
        const parsed = Number.parseFloat(ms)
        if (Number.isFinite(parsed) && parsed >= 0) return Math.round(parsed)
    }
    const value = headers['retry-after']
    if (!value) return undefined
    const seconds = Number.parseFloat(value)
    if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000)
    const date = Date.parse(value)
    if (Number.isFinite(date)) return Math.max(0, date - nowMs)
    return undefined
}

/**
 * Reduce an SDK error to a bounded set of diagnostics.
 * NOTE: request ids are left out to keep cardinality low.
 */
export function diagnosticsFromError(error: unknown, nowMs: number = Date.now()): LlmCallDiagnostics {
    if (error instanceof APIUserAbortError || error instanceof APIConnectionTimeoutError) {
        return { outcome: 'timeout', errorName: error.name }
    }
    if (error instanceof APIError) {
        const base: LlmCallDiagnostics = {
            outcome: error.status === 429 ? 'rate-limited' : 'error',
            httpStatus: error.status,
            errorCode: typeof error.code === 'string' ? error.code : undefined,
            errorType: typeof error.type === 'string' ? error.type : undefined,
            errorName: error.name,
            errorMessage: error.message
        }
        if (base.outcome === 'rate-limited') {
            base.retryAfterMs = parseRetryAfterMs(error.headers, nowMs)
        }
        return base
    }
    if (error instanceof Error) {
        return {
            outcome: error.name === 'AbortError' ? 'timeout' : 'error',
            errorName: error.name,
            errorMessage: error.message
        }
    }
    return { outcome: 'error', errorName: 'UnknownError', errorMessage: String(error) }
}

/**
 * The part of the OpenAI SDK surface the client calls. Both `OpenAI` and `AzureOpenAI` satisfy it.
 */
export interface ChatSdk {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>
        }
    }
    embeddings: {
        create(body: EmbeddingCreateParams): Promise<CreateEmbeddingResponse>
    }
}

function createSdkClient(config: LlmProviderConfig): ChatSdk {
    if (config.kind === 'openai') {
        return new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 })
    }
    // System-assigned MI in production, az login locally, OIDC in CI
    const credential = new DefaultAzureCredential()
    const azureADTokenProvider = getBearerTokenProvider(credential, 'https://cognitiveservices.azure.com/.default')
    return new AzureOpenAI({
        endpoint: config.endpoint,
        azureADTokenProvider,
        deployment: config.model,
        apiVersion: config.apiVersion,
        maxRetries: 0
    })
}

/**
 * Chat completion client for OpenAI and Azure OpenAI deployments.
 */
@injectable()
export class OpenAIChatClient implements ILlmClient, IEmbeddingClient {
    private readonly client: ChatSdk

    constructor(
        private readonly config: LlmProviderConfig,
        client?: ChatSdk
    ) {
        this.client = client ?? createSdkClient(config)
    }

    async complete(options: LlmCompleteOptions): Promise<LlmCallResult> {
        const { messages, maxTokens = 1500, temperature = 0, timeoutMs = DEFAULT_TIMEOUT_MS, jsonMode = false } = options

        const controller = new AbortController()
        const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs)

        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.config.model,
                    messages: messages.map(toMessageParam),
                    max_tokens: maxTokens,
                    temperature,
                    ...(jsonMode ? { response_format: { type: 'json_object' as const } } : {})
                },
                { signal: controller.signal }
            )

            const content = (response.choices[0]?.message?.content ?? '').trim()
            if (!content) {
                return { result: null, diagnostics: { outcome: 'empty' } }
            }

            return {
                result: {
                    content,
                    tokenUsage: {
                        prompt: response.usage?.prompt_tokens ?? 0,
                        completion: response.usage?.completion_tokens ?? 0,
                        total: response.usage?.total_tokens ?? 0
                    }
                },
                diagnostics: { outcome: 'success' }
            }
        } catch (error) {
            return { result: null, diagnostics: diagnosticsFromError(error) }
        } finally {
            clearTimeout(timeoutHandle)
        }
    }

    embeddingsAvailable(): boolean {
        return Boolean(this.config.embeddingModel)
    }

    async embed(texts: readonly string[]): Promise<LlmEmbeddingResult> {
        if (texts.length === 0) return { vectors: [], diagnostics: { outcome: 'success' } }
        const model = this.config.embeddingModel
        if (!model) {
            return { vectors: null, diagnostics: { outcome: 'error', errorCode: 'no_embedding_model' } }
        }
        try {
            const response = await this.client.embeddings.create({ model, input: [...texts] })
            const vectors = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding)
            return vectors.length > 0 ? { vectors, diagnostics: { outcome: 'success' } } : { vectors: null, diagnostics: { outcome: 'empty' } }
        } catch (error) {
            return { vectors: null, diagnostics: diagnosticsFromError(error) }
        }
    }

    async healthCheck(): Promise<boolean> {
        const { diagnostics } = await this.complete({
            messages: [{ role: 'user', content: 'Reply with OK.' }],
            maxTokens: 5,
            timeoutMs: 15_000
        })
        return diagnostics.outcome === 'success'
    }
}
