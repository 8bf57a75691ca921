import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { lexicalSimilarity } from '@specmap/shared'
import { cosineSimilarity, EmbeddingSimilarityScorer, LexicalSimilarityScorer } from '../../src/services/similarityScorer.js'
import { createHarness } from '../helpers/testServices.js'
import { rateLimited, ScriptedLlmClient, transportError, type Embedder } from '../mocks/ScriptedLlmClient.js'

const VECTORS: Record<string, number[]> = {
    brightness: [1, 0, 0],
    luminance: [3, 4, 0],
    haze: [0, 0, 1]
}

function vectorsFor(texts: readonly string[]): number[][] {
    return texts.map((t) => VECTORS[t] ?? [0, 1, 0])
}

async function embeddingScorer(embedder?: Embedder) {
    const llm = ScriptedLlmClient.idle()
    llm.embedder = embedder
    const h = await createHarness(llm)
    return { h, llm, scorer: new EmbeddingSimilarityScorer(h.executor) }
}

describe('cosineSimilarity', () => {
    test('orthogonal, parallel and degenerate vectors', () => {
        assert.equal(cosineSimilarity([1, 0], [0, 1]), 0)
        assert.equal(cosineSimilarity([2, 0], [5, 0]), 1)
        assert.equal(cosineSimilarity([0, 0], [1, 0]), 0)
        assert.equal(cosineSimilarity([1], [1, 0]), 0)
    })
})

describe('LexicalSimilarityScorer', () => {
    test('scores every candidate in order', async () => {
        const scores = await new LexicalSimilarityScorer().scoreAll('Contrast Ratio', ['contrast-ratio', 'ratio contrast', 'Haze'])
        assert.equal(scores[0], 1)
        assert.equal(scores[1], 1)
        assert.ok(scores[2] < 0.5)
    })
})

describe('EmbeddingSimilarityScorer', () => {
    test('scores by cosine similarity and embeds each key once', async () => {
        const { llm, scorer } = await embeddingScorer(vectorsFor)

        const first = await scorer.scoreAll('Brightness', ['Luminance', 'Haze'])
        const second = await scorer.scoreAll('BRIGHTNESS', ['Luminance'])

        assert.deepEqual(first, [0.6, 0])
        assert.deepEqual(second, [0.6])
        assert.deepEqual(llm.embedCalls, [['brightness', 'luminance', 'haze']])
    })

    test('scores lexically without calling the provider when no embedding model is configured', async () => {
        const { llm, scorer } = await embeddingScorer()
        const scores = await scorer.scoreAll('Luminance', ['luminance', 'Haze'])
        assert.equal(scores[0], 1)
        assert.ok(scores[1] < 0.5)
        assert.deepEqual(llm.embedCalls, [])
    })

    test('a rate-limited batch waits on the governor and is retried', async () => {
        const { h, llm, scorer } = await embeddingScorer((texts, call) => (call === 0 ? rateLimited(300).diagnostics : vectorsFor(texts)))

        assert.deepEqual(await scorer.scoreAll('Brightness', ['Luminance']), [0.6])
        assert.equal(llm.embedCalls.length, 2)
        assert.deepEqual(h.waits, [300])
        assert.deepEqual(
            h.telemetryClient.propertiesOf('LLM.Call.RateLimited').map((p) => p.operation),
            ['embedding']
        )
    })

    test('a transient failure is retried with backoff', async () => {
        const { h, llm, scorer } = await embeddingScorer((texts, call) =>
            call === 0 ? transportError().diagnostics : vectorsFor(texts)
        )

        assert.deepEqual(await scorer.scoreAll('Brightness', ['Luminance']), [0.6])
        assert.equal(llm.embedCalls.length, 2)
        assert.deepEqual(h.waits, [100])
    })

    test('a batch that fails every attempt is not cached as a miss', async () => {
        const { h, llm, scorer } = await embeddingScorer((texts, call) =>
            call < 3 ? transportError().diagnostics : vectorsFor(texts)
        )

        const first = await scorer.scoreAll('Brightness', ['Luminance'])
        assert.deepEqual(first, [lexicalSimilarity('Brightness', 'Luminance')])
        assert.deepEqual(h.waits, [100, 200])
        assert.equal(h.telemetryClient.eventsNamed('LLM.Call.Failed').length, 3)

        const second = await scorer.scoreAll('Brightness', ['Luminance'])
        assert.deepEqual(second, [0.6])
        assert.equal(llm.embedCalls.length, 4)
    })
})
