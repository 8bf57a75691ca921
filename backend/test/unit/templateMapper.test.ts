import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { TemplateValidationError, UNMATCHED, type TemplateSlot } from '@specmap/shared'
import { compareCandidatePairs, validateTemplateSlots } from '../../src/services/TemplateMapper.js'
import { canonicalSpec, fixedScorer, instance } from '../helpers/fixtures.js'
import { createHarness } from '../helpers/testServices.js'
import { ScriptedLlmClient } from '../mocks/ScriptedLlmClient.js'

const SLOTS: TemplateSlot[] = [
    { labelText: 'Luminance (cd/m²)', cellCoordinate: 'B2', expectedUnit: 'cd/m²' },
    { labelText: 'Contrast ratio', cellCoordinate: 'B3' },
    { labelText: 'Haze (%)', cellCoordinate: 'B4', expectedUnit: '%' }
]

const luminance = canonicalSpec('Luminance', [
    instance({ locator: 'Page 3', name: 'Leuchtdichte', value: 1000, unit: 'cd/m²', confidence: 0.95 })
])
const contrast = canonicalSpec('Contrast Ratio', [
    instance({ locator: 'Page 4', name: 'Kontrastverhältnis', value: 1000, unit: ':1', confidence: 0.9 })
])

describe('TemplateMapper', () => {
    test('exact label matches are assigned with score 1 in spec order', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())

        const results = await h.templateMapper.map([luminance, contrast], SLOTS)

        assert.deepEqual(results, [
            { standardName: 'Luminance', slotRef: 'B2', similarityScore: 1 },
            { standardName: 'Contrast Ratio', slotRef: 'B3', similarityScore: 1 }
        ])
        assert.equal(h.telemetryClient.eventsNamed('Mapping.Slot.Assigned').length, 2)
    })

    test('a slot label matching an alias of the standard name scores 1', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const [result] = await h.templateMapper.map([luminance], [{ labelText: 'Brightness', cellCoordinate: 'C7' }])
        assert.deepEqual(result, { standardName: 'Luminance', slotRef: 'C7', similarityScore: 1 })
    })

    test('a spec with no slot above the threshold is unmatched with its best score', async () => {
        const h = await createHarness(ScriptedLlmClient.idle(), { scorer: fixedScorer(0.4) })
        const flux = canonicalSpec('Flux Capacitance', [instance({ locator: 'Page 9', name: 'Flux Capacitance', value: 3, unit: 'F', confidence: 0.7 })], {
            nonStandard: true
        })

        const [result] = await h.templateMapper.map([flux], SLOTS)

        assert.deepEqual(result, { standardName: 'Flux Capacitance', slotRef: UNMATCHED, similarityScore: 0.4 })
        assert.equal(h.telemetryClient.eventsNamed('Mapping.Spec.Unmatched').length, 1)
    })

    test('a score equal to the threshold is not enough', async () => {
        const h = await createHarness(ScriptedLlmClient.idle(), { scorer: fixedScorer(0.75) })
        const [result] = await h.templateMapper.map([luminance], [{ labelText: 'Peak white', cellCoordinate: 'B2' }])
        assert.equal(result.slotRef, UNMATCHED)
        assert.equal(result.similarityScore, 0.75)
    })

    test('a slot is claimed once; equal scores go to the higher confidence', async () => {
        const h = await createHarness(ScriptedLlmClient.idle(), { scorer: fixedScorer(0.9) })
        const weak = canonicalSpec('Alpha Level', [instance({ locator: 'Page 1', name: 'Alpha Level', value: 1, unit: 'V', confidence: 0.6 })], {
            nonStandard: true
        })
        const strong = canonicalSpec('Beta Level', [instance({ locator: 'Page 2', name: 'Beta Level', value: 2, unit: 'V', confidence: 0.8 })], {
            nonStandard: true
        })

        const results = await h.templateMapper.map([weak, strong], [{ labelText: 'Supply level', cellCoordinate: 'D4' }])

        assert.deepEqual(results, [
            { standardName: 'Alpha Level', slotRef: UNMATCHED, similarityScore: 0.9 },
            { standardName: 'Beta Level', slotRef: 'D4', similarityScore: 0.9 }
        ])
    })

    test('equal score and confidence go to the standard name first in natural order', async () => {
        const h = await createHarness(ScriptedLlmClient.idle(), { scorer: fixedScorer(0.9) })
        const zone = (name: string, locator: string) =>
            canonicalSpec(name, [instance({ locator, name, value: 1, unit: 'V', confidence: 0.8 })], { nonStandard: true })

        const results = await h.templateMapper.map(
            [zone('Zone 10', 'Page 1'), zone('Zone 2', 'Page 2')],
            [{ labelText: 'Zone level', cellCoordinate: 'D4' }]
        )

        assert.deepEqual(results, [
            { standardName: 'Zone 10', slotRef: UNMATCHED, similarityScore: 0.9 },
            { standardName: 'Zone 2', slotRef: 'D4', similarityScore: 0.9 }
        ])
    })

    test('standard names compare case-insensitively, then by code unit', () => {
        const slot: TemplateSlot = { labelText: 'Level', cellCoordinate: 'A1' }
        const pair = (name: string) => ({
            spec: canonicalSpec(name, [instance({ locator: 'Page 1', name, value: 1, unit: 'V', confidence: 0.8 })], { nonStandard: true }),
            slot,
            score: 0.9
        })

        const names = [pair('beta'), pair('Beta'), pair('alpha')].sort(compareCandidatePairs).map((p) => p.spec.standardName)

        assert.deepEqual(names, ['alpha', 'Beta', 'beta'])
    })

    test('equal scores for one spec go to the earliest slot', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const [result] = await h.templateMapper.map(
            [luminance],
            [
                { labelText: 'Luminance', cellCoordinate: 'B10' },
                { labelText: 'Luminance', cellCoordinate: 'C2' },
                { labelText: 'Luminance', cellCoordinate: 'B2' }
            ]
        )
        assert.equal(result.slotRef, 'B2')
    })

    test('a slot whose unit family conflicts is not eligible', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        const [result] = await h.templateMapper.map([luminance], [{ labelText: 'Luminance', cellCoordinate: 'B2', expectedUnit: 'mm' }])
        assert.deepEqual(result, { standardName: 'Luminance', slotRef: UNMATCHED, similarityScore: 0 })
    })

    test('no specs yields no results', async () => {
        const h = await createHarness(ScriptedLlmClient.idle())
        assert.deepEqual(await h.templateMapper.map([], SLOTS), [])
    })
})

describe('validateTemplateSlots', () => {
    test('a template without slots is rejected', () => {
        assert.throws(
            () => validateTemplateSlots([]),
            (error: unknown) => {
                assert.ok(error instanceof TemplateValidationError)
                assert.deepEqual(error.problems, ['template defines no slots'])
                return true
            }
        )
    })

    test('every problem is reported', () => {
        assert.throws(
            () =>
                validateTemplateSlots([
                    { labelText: 'Luminance', cellCoordinate: 'B2' },
                    { labelText: 'Haze', cellCoordinate: 'b2' },
                    { labelText: 'Reflectance', cellCoordinate: '2B' },
                    { labelText: ' ', cellCoordinate: 'C3' }
                ]),
            (error: unknown) => {
                assert.ok(error instanceof TemplateValidationError)
                assert.equal(error.code, 'TemplateValidationError')
                assert.deepEqual(error.problems, [
                    'duplicate slot coordinate B2',
                    'slot "Reflectance" has invalid coordinate "2B"',
                    'slot C3 has an empty label'
                ])
                return true
            }
        )
    })
})
