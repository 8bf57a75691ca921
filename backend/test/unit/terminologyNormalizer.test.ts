import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { MemoryTerminologyRepository } from '../../src/repos/terminologyRepository.memory.js'
import { pickRepresentative } from '../../src/services/TerminologyNormalizer.js'
import { instance } from '../helpers/fixtures.js'
import { createHarness } from '../helpers/testServices.js'
import { ScriptedLlmClient } from '../mocks/ScriptedLlmClient.js'

describe('TerminologyNormalizer.resolveName', () => {
    test('a German alias resolves through the table', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const resolved = await h.terminologyNormalizer.resolveName('Leuchtdichte', 'cd/m²')
        assert.deepEqual(resolved, { standardName: 'Luminance', resolution: 'table', score: 1, unitFamily: 'luminance' })
    })

    test('a close misspelling resolves by similarity and is learned as an alias', async () => {
        const terminology = await MemoryTerminologyRepository.fromCanonicalTable()
        const h = await createHarness(ScriptedLlmClient.idle(), { terminology })

        const first = await h.terminologyNormalizer.resolveName('Luminence', 'cd/m²')
        assert.equal(first.standardName, 'Luminance')
        assert.equal(first.resolution, 'similarity')
        assert.equal(first.score, 1 - 1 / 9)
        assert.deepEqual(terminology.learnedAliases(), [{ alias: 'Luminence', standardName: 'Luminance' }])

        const second = await h.terminologyNormalizer.resolveName('Luminence', 'cd/m²')
        assert.equal(second.resolution, 'similarity')
        assert.equal(second.score, 1)
        assert.equal(h.telemetryClient.eventsNamed('Terminology.Alias.Learned').length, 1)
    })

    test('a similar name in a conflicting unit family is not resolved', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const resolved = await h.terminologyNormalizer.resolveName('Luminence', 'mm')
        assert.equal(resolved.resolution, 'non-standard')
        assert.equal(resolved.standardName, 'Luminence')
    })

    test('an unknown name stays non-standard', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const resolved = await h.terminologyNormalizer.resolveName(' Flux Capacitance ', 'F')
        assert.equal(resolved.resolution, 'non-standard')
        assert.equal(resolved.standardName, 'Flux Capacitance')
        assert.ok(resolved.score <= h.config.termSimilarityThreshold)
    })
})

describe('TerminologyNormalizer.canonicalize', () => {
    const german = instance({ locator: 'Page 2', name: 'Kontrastverhältnis', value: 1000, unit: ':1', confidence: 0.8 })
    const english = instance({ file: 'vendor-b.pdf', locator: 'Page 1', name: 'Contrast Ratio', value: 1200, unit: ':1', confidence: 0.9 })
    const luminance = instance({ locator: 'Page 3', name: 'Leuchtdichte', value: 1000, unit: 'cd/m²', confidence: 0.95, condition: '25°C' })

    test('aliases from different languages merge into one canonical spec', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())

        const { specs, resolutions } = await h.terminologyNormalizer.canonicalize([english, luminance, german])

        assert.deepEqual(
            specs.map((s) => s.standardName),
            ['Contrast Ratio', 'Luminance']
        )
        const [contrast, lum] = specs
        assert.deepEqual(
            contrast.contributingInstances.map((i) => i.instanceId),
            ['vendor-a.pdf#Page 2::0', 'vendor-b.pdf#Page 1::0']
        )
        assert.equal(contrast.resolvedValue, 1200)
        assert.equal(contrast.resolvedConfidence, 0.9)
        assert.equal(contrast.representativeInstanceId, 'vendor-b.pdf#Page 1::0')
        assert.equal(contrast.resolution, 'table')
        assert.equal(contrast.unitFamily, 'ratio')
        assert.equal(contrast.nonStandard, false)

        assert.equal(lum.resolvedCondition, '25°C')
        assert.equal(resolutions.get(german.instanceId)?.standardName, 'Contrast Ratio')
        assert.equal(resolutions.size, 3)
    })

    test('equal confidence keeps the earliest location', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const late = instance({ locator: 'Page 10', name: 'Haze', value: 2, unit: '%', confidence: 0.9 })
        const early = instance({ locator: 'Page 2', name: 'Haze', value: 1, unit: '%', confidence: 0.9 })

        const { specs } = await h.terminologyNormalizer.canonicalize([late, early])

        assert.equal(specs.length, 1)
        assert.equal(specs[0].resolvedValue, 1)
        assert.equal(specs[0].representativeInstanceId, 'vendor-a.pdf#Page 2::0')
    })

    test('the result does not depend on input order', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const forward = await h.terminologyNormalizer.canonicalize([german, english, luminance])
        const shuffled = await h.terminologyNormalizer.canonicalize([luminance, german, english])
        assert.deepEqual(shuffled.specs, forward.specs)
    })

    test('a lower-confidence instance never replaces the resolved value', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const weak = instance({ file: 'vendor-c.pdf', locator: 'Page 1', name: 'Contrast', value: 800, unit: ':1', confidence: 0.5 })

        const { specs } = await h.terminologyNormalizer.canonicalize([german, english, weak])

        assert.equal(specs.length, 1)
        assert.equal(specs[0].contributingInstances.length, 3)
        assert.equal(specs[0].resolvedValue, 1200)
        assert.equal(specs[0].resolvedConfidence, 0.9)
    })

    test('non-standard names group by their normalized raw name', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const a = instance({ locator: 'Page 1', name: 'Flux Capacitance', value: 3, unit: 'F', confidence: 0.7 })
        const b = instance({ locator: 'Page 4', name: 'flux-capacitance', value: 4, unit: 'F', confidence: 0.8 })

        const { specs } = await h.terminologyNormalizer.canonicalize([b, a])

        assert.equal(specs.length, 1)
        assert.equal(specs[0].standardName, 'Flux Capacitance')
        assert.equal(specs[0].nonStandard, true)
        assert.equal(specs[0].resolution, 'non-standard')
        assert.equal(specs[0].resolvedValue, 4)
        assert.equal(h.telemetryClient.eventsNamed('Terminology.Term.NonStandard').length, 1)
    })
})

describe('pickRepresentative', () => {
    test('an empty group is an error', () => {
        assert.throws(() => pickRepresentative([]), /empty instance group/)
    })
})
