/**
 * Similarity scorers for the terminology fallback and template mapping.
 *
 * - Lexical: edit-distance / token-overlap over normalized term keys (default, no model calls)
 * - Embedding: cosine similarity of provider embeddings, falling back to lexical when no
 *   embedding model is configured or a batch fails after retries
 *
 * Scores are in [0,1].
 */
import { lexicalSimilarity, normalizeTermKey } from '@specmap/shared'
import type { LlmRequestExecutor } from './LlmRequestExecutor.js'

export interface ISimilarityScorer {
    readonly kind: 'lexical' | 'embedding'

    /**
     * Score `text` against every candidate, in candidate order.
     */
    scoreAll(text: string, candidates: readonly string[]): Promise<number[]>
}

export class LexicalSimilarityScorer implements ISimilarityScorer {
    readonly kind = 'lexical' as const

    async scoreAll(text: string, candidates: readonly string[]): Promise<number[]> {
        return candidates.map((candidate) => lexicalSimilarity(text, candidate))
    }
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length || a.length === 0) return 0
    let dot = 0
    let normA = 0
    let normB = 0
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i]
        normA += a[i] * a[i]
        normB += b[i] * b[i]
    }
    if (normA === 0 || normB === 0) return 0
    return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/**
 * Batches go through the request executor, so they wait on the call governor and retry under
 * the shared policy. A batch that still fails leaves nothing cached: the call scores lexically
 * and the next call asks the provider again.
 */
export class EmbeddingSimilarityScorer implements ISimilarityScorer {
    readonly kind = 'embedding' as const
    private readonly vectors = new Map<string, Promise<number[] | null>>()

    constructor(
        private readonly executor: LlmRequestExecutor,
        private readonly fallback: ISimilarityScorer = new LexicalSimilarityScorer()
    ) {}

    async scoreAll(text: string, candidates: readonly string[]): Promise<number[]> {
        if (!this.executor.embeddingsAvailable) {
            return this.fallback.scoreAll(text, candidates)
        }
        const [query, ...rest] = await this.embedAll([text, ...candidates])
        if (!query || rest.some((v) => v === null)) {
            return this.fallback.scoreAll(text, candidates)
        }
        return rest.map((vector) => (vector ? Math.min(1, Math.max(0, cosineSimilarity(query, vector))) : 0))
    }

    private async embedAll(texts: readonly string[]): Promise<Array<number[] | null>> {
        const keys = texts.map((t) => normalizeTermKey(t))
        const missing = [...new Set(keys.filter((k) => !this.vectors.has(k)))]
        if (missing.length > 0) {
            const batch = this.executor.embed(missing).then((outcome) => (outcome.ok ? outcome.value : null))
            missing.forEach((key, index) => {
                const vector: Promise<number[] | null> = batch.then((vectors) => {
                    const found = vectors?.[index] ?? null
                    if (!found && this.vectors.get(key) === vector) this.vectors.delete(key)
                    return found
                })
                this.vectors.set(key, vector)
            })
        }
        return Promise.all(keys.map((key) => this.vectors.get(key) ?? Promise.resolve(null)))
    }
}
