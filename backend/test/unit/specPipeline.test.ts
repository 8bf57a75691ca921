import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { ConfigurationError, TemplateValidationError, UNMATCHED, type DocumentFragment, type TemplateSlot } from '@specmap/shared'
import ExcelJS from 'exceljs'
import type { LlmCallResult, LlmCompleteOptions } from '../../src/services/llmClient.js'
import { loadWorkbook } from '../../src/template/TemplateReader.js'
import { createHarness } from '../helpers/testServices.js'
import { operationOf, reply, requestText, ScriptedLlmClient, specsReply, transportError } from '../mocks/ScriptedLlmClient.js'

const GERMAN = 'Leuchtdichte: ≥ 1000 cd/m² (bei 25°C)'
const ENGLISH = 'Luminance: ≥ 1000 cd/m² (at 25°C)'
const CONTRAST = 'Contrast ratio: 1200:1 typical'
const FLUX = 'Flux capacitance: 3 F'

const FRAGMENTS: DocumentFragment[] = [
    { sourceFile: 'vendor-a.pdf', locator: 'Page 3', rawText: GERMAN },
    { sourceFile: 'vendor-b.pdf', locator: 'Page 1', rawText: CONTRAST, detectedLanguage: 'en' },
    { sourceFile: 'vendor-b.pdf', locator: 'Page 2', rawText: FLUX, detectedLanguage: 'en' }
]

const SLOTS: TemplateSlot[] = [
    { labelText: 'Luminance (cd/m²)', cellCoordinate: 'B2', expectedUnit: 'cd/m²' },
    { labelText: 'Contrast ratio', cellCoordinate: 'B3' },
    { labelText: 'Haze (%)', cellCoordinate: 'B4', expectedUnit: '%' }
]

const EXTRACTIONS: Record<string, Array<Record<string, unknown>>> = {
    [ENGLISH]: [{ spec_name: 'Luminance', value: 1000, unit: 'cd/m²', condition: '25°C', confidence: 0.95, source_text: 'Luminance: ≥ 1000 cd/m²' }],
    [GERMAN]: [{ spec_name: 'Leuchtdichte', value: 1000, unit: 'cd/m²', confidence: 0.6, source_text: 'Leuchtdichte: ≥ 1000 cd/m²' }],
    [CONTRAST]: [{ spec_name: 'Contrast Ratio', value: 1200, unit: ':1', confidence: 0.9, source_text: CONTRAST }],
    [FLUX]: [{ spec_name: 'Flux Capacitance', value: 3, unit: 'F', confidence: 0.7, source_text: FLUX }]
}

interface ModelOptions {
    translation?: (text: string) => LlmCallResult
    extraction?: (text: string) => LlmCallResult
    relevance?: () => LlmCallResult
    /** Milliseconds to hold each extraction reply, by fragment text */
    extractionDelayMs?: (text: string) => number
}

function model(options: ModelOptions = {}): ScriptedLlmClient {
    return new ScriptedLlmClient(async (request: LlmCompleteOptions) => {
        const text = requestText(request)
        switch (operationOf(request)) {
            case 'translation':
                return options.translation ? options.translation(text) : reply(text === GERMAN ? ENGLISH : text)
            case 'extraction': {
                const delayMs = options.extractionDelayMs?.(text) ?? 0
                if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs))
                if (options.extraction) return options.extraction(text)
                return specsReply(EXTRACTIONS[text] ?? [])
            }
            case 'relevance':
                return options.relevance ? options.relevance() : reply('{"is_relevant": true}')
            default:
                return transportError('unexpected request')
        }
    })
}

async function templateBuffer(): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook()
    const sheet = workbook.addWorksheet('Template')
    sheet.addRow(['Specification Type', 'Value'])
    sheet.addRow(['Luminance (cd/m²)'])
    sheet.addRow(['Contrast ratio'])
    sheet.addRow(['Haze (%)'])
    return Buffer.from(await workbook.xlsx.writeBuffer())
}

describe('SpecPipeline', () => {
    test('multilingual sources end up in the template with provenance', async () => {
        const h = await createHarness(model())

        const result = await h.pipeline.run(FRAGMENTS, SLOTS)

        assert.deepEqual(
            result.output.populated.map((p) => [p.slot.cellCoordinate, p.standardName, p.cellValue, p.band]),
            [
                ['B2', 'Luminance', 1000, 'high'],
                ['B3', 'Contrast Ratio', '1200 :1', 'high']
            ]
        )
        assert.deepEqual(
            result.output.unmatched.map((u) => [u.standardName, u.nonStandard]),
            [['Flux Capacitance', true]]
        )
        assert.deepEqual(
            result.output.emptySlots.map((s) => s.cellCoordinate),
            ['B4']
        )
        assert.deepEqual(result.output.summary, {
            fragments: 3,
            nativeFragments: 2,
            translatedFragments: 1,
            failedTranslations: 0,
            failedExtractions: 0,
            filteredDocuments: 0,
            instances: 3,
            canonicalSpecs: 3,
            mapped: 2,
            unmatched: 1,
            emptySlots: 1,
            issues: []
        })

        const luminance = result.references.find((r) => r.standardName === 'Luminance')
        assert.equal(luminance?.originalText, GERMAN)
        assert.equal(luminance?.translatedText, ENGLISH)
        assert.equal(luminance?.slotRef, 'B2')
        assert.equal(luminance?.condition, '25°C')
        assert.deepEqual(result.mappings.find((m) => m.standardName === 'Flux Capacitance')?.slotRef, UNMATCHED)

        assert.equal(h.llm.callsFor('translation').length, 1)
        assert.equal(h.llm.callsFor('extraction').length, 3)
        const names = h.telemetryClient.eventNames()
        assert.equal(names[0], 'Pipeline.Run.Started')
        assert.equal(names.at(-1), 'Pipeline.Run.Completed')
        assert.equal(h.telemetry.currentRunId, undefined)
    })

    test('a failed translation still yields the value, flagged, with an issue', async () => {
        const h = await createHarness(model({ translation: () => transportError() }))

        const result = await h.pipeline.run(FRAGMENTS.slice(0, 1), SLOTS)

        const [populated] = result.output.populated
        assert.equal(populated.cellValue, 1000)
        assert.equal(populated.band, 'medium')
        assert.equal(
            populated.annotation,
            [
                'Source: vendor-a.pdf',
                'Location: Page 3',
                `Original: ${GERMAN}`,
                'Translation failed: value read from the original text',
                'Confidence: 60%'
            ].join('\n')
        )
        assert.deepEqual(result.references[0].flags, ['translation-failed'])
        assert.deepEqual(result.output.summary.issues, [
            {
                kind: 'translation',
                code: 'TranslationFailure',
                errorKind: 'model',
                sourceFile: 'vendor-a.pdf',
                locator: 'Page 3',
                message: 'error: connection reset'
            }
        ])
        assert.equal(result.output.summary.failedTranslations, 1)
        assert.equal(h.llm.callsFor('translation').length, 3)
    })

    test('bad fragments and failed extractions are isolated and recorded in input order', async () => {
        const h = await createHarness(model({ extraction: (text) => (text === FLUX ? reply('not json') : specsReply(EXTRACTIONS[text] ?? [])) }))
        const fragments: DocumentFragment[] = [
            { sourceFile: 'vendor-c.pdf', locator: ' ', rawText: 'orphan text' },
            ...FRAGMENTS,
            { sourceFile: 'vendor-c.pdf', locator: 'Page 4', rawText: '  ' },
            { sourceFile: 'vendor-b.pdf', locator: 'Page 1', rawText: 'second copy', detectedLanguage: 'en' }
        ]

        const result = await h.pipeline.run(fragments, SLOTS)

        assert.deepEqual(
            result.output.summary.issues.map((i) => [i.kind, i.code, i.sourceFile, i.locator]),
            [
                ['parse', 'EmptyLocator', 'vendor-c.pdf', ' '],
                ['parse', 'EmptyText', 'vendor-c.pdf', 'Page 4'],
                ['parse', 'ParseFailure', 'vendor-b.pdf', 'Page 1'],
                ['extraction', 'ExtractionFailure', 'vendor-b.pdf', 'Page 2']
            ]
        )
        assert.equal(result.output.summary.fragments, 6)
        assert.equal(result.output.summary.failedExtractions, 1)
        assert.equal(result.output.summary.mapped, 2)
        assert.equal(h.telemetryClient.eventsNamed('Fragment.Input.Rejected').length, 3)
    })

    test('documents without relevance keywords are skipped entirely', async () => {
        const h = await createHarness(model(), { config: { relevanceKeywords: ['contrast'] } })
        const fragments: DocumentFragment[] = [
            { sourceFile: 'invoice.pdf', locator: 'Page 1', rawText: 'Invoice total: 420 EUR', detectedLanguage: 'en' },
            FRAGMENTS[1]
        ]

        const result = await h.pipeline.run(fragments, SLOTS)

        assert.deepEqual(
            result.relevance.map((d) => [d.sourceFile, d.relevant, d.stage]),
            [
                ['invoice.pdf', false, 'keywords'],
                ['vendor-b.pdf', true, 'model']
            ]
        )
        assert.deepEqual(result.output.summary.issues, [
            {
                kind: 'relevance',
                code: 'DocumentFiltered',
                errorKind: 'input',
                sourceFile: 'invoice.pdf',
                message: 'no relevance keyword found'
            }
        ])
        assert.equal(result.output.summary.filteredDocuments, 1)
        assert.equal(h.llm.callsFor('relevance').length, 1)
        assert.equal(h.llm.callsFor('extraction').length, 1)
    })

    test('the result does not depend on the order in which fragment work completes', async () => {
        const slowFirst = await createHarness(model({ extractionDelayMs: (text) => (text === ENGLISH ? 15 : 1) }))
        const slowLast = await createHarness(model({ extractionDelayMs: (text) => (text === FLUX ? 15 : 1) }))

        const a = await slowFirst.pipeline.run(FRAGMENTS, SLOTS)
        const b = await slowLast.pipeline.run([...FRAGMENTS].reverse(), SLOTS)

        assert.deepEqual(b.canonical.specs, a.canonical.specs)
        assert.deepEqual(b.mappings, a.mappings)
        assert.deepEqual(b.output.populated, a.output.populated)
    })

    test('a failing health check aborts before any fragment work', async () => {
        const h = await createHarness(model(), { config: { preflight: true } })
        h.llm.healthy = false

        await assert.rejects(h.pipeline.run(FRAGMENTS, SLOTS), (error: unknown) => {
            assert.ok(error instanceof ConfigurationError)
            assert.equal(error.message, 'LLM provider health check failed: check credentials, endpoint and model deployment')
            return true
        })

        assert.equal(h.llm.calls.length, 0)
        const [aborted] = h.telemetryClient.propertiesOf('Pipeline.Run.Aborted')
        assert.equal(aborted.stage, 'run')
        assert.equal(aborted.errorCode, 'ConfigurationError')
        assert.equal(aborted.errorKind, 'config')
        assert.equal(h.telemetryClient.exceptions.length, 1)
    })

    test('invalid slots abort the run', async () => {
        const h = await createHarness(model())
        await assert.rejects(h.pipeline.run(FRAGMENTS, []), TemplateValidationError)
        assert.equal(h.llm.calls.length, 0)
    })

    test('runWithTemplate writes the populated workbook', async () => {
        const h = await createHarness(model())

        const result = await h.pipeline.runWithTemplate(FRAGMENTS, await templateBuffer())

        const workbook = await loadWorkbook(result.workbook)
        const summary = workbook.getWorksheet('Spec Summary')
        assert.ok(summary)
        assert.equal(summary.getCell('B2').value, 1000)
        assert.equal(summary.getCell('B3').value, '1200 :1')
        assert.equal(summary.getCell('B4').value, null)
    })

    test('an unreadable template aborts with the template stage', async () => {
        const h = await createHarness(model())

        await assert.rejects(h.pipeline.runWithTemplate(FRAGMENTS, Buffer.from('not a workbook')), TemplateValidationError)

        assert.deepEqual(
            h.telemetryClient.propertiesOf('Pipeline.Run.Aborted').map((p) => p.stage),
            ['template']
        )
        assert.equal(h.llm.calls.length, 0)
    })
})
