/**
 * Spec Pipeline - orchestrates one run
 *
 * fragments → (relevance) → language normalization → extraction → canonicalization → mapping
 * → provenance → assembled output (→ workbook)
 *
 * Fatal problems (invalid template, failed provider health check) abort before any fragment work.
 * Everything that goes wrong for a single fragment or document is recorded in the run issue log
 * and the run continues with the rest.
 */
import {
    compareNatural,
    ConfigurationError,
    fragmentIdOf,
    PipelineException,
    splitLabelUnit,
    type DocumentFragment,
    type ExtractedSpecInstance,
    type MappingResult,
    type ReferenceRecord,
    type TemplateSlot,
    type TranslatedFragment
} from '@specmap/shared'
import { inject, injectable } from 'inversify'
import type { PipelineConfig } from '../config/pipelineConfig.js'
import { TOKENS } from '../di/tokens.js'
import { assembleOutput, type AssembledOutput } from '../output/OutputAssembler.js'
import { WorkbookWriter } from '../output/WorkbookWriter.js'
import { DocumentRelevanceFilter, type RelevanceDecision } from '../services/DocumentRelevanceFilter.js'
import { LanguageNormalizer } from '../services/LanguageNormalizer.js'
import type { ILlmClient } from '../services/llmClient.js'
import { ProvenanceTracker } from '../services/ProvenanceTracker.js'
import { SpecExtractionEngine, type FragmentExtraction } from '../services/SpecExtractionEngine.js'
import { TemplateMapper, validateTemplateSlots } from '../services/TemplateMapper.js'
import { TerminologyNormalizer, type CanonicalizationResult } from '../services/TerminologyNormalizer.js'
import { buildErrorAttributes } from '../telemetry/errorTelemetry.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { readTemplateSlots } from '../template/TemplateReader.js'
import { mapWithConcurrency } from './concurrency.js'
import { RunIssueLog, type RunIssueKind } from './RunIssueLog.js'

export interface PipelineRunResult {
    runId: string
    relevance: RelevanceDecision[]
    translated: TranslatedFragment[]
    extractions: FragmentExtraction[]
    canonical: CanonicalizationResult
    mappings: MappingResult[]
    references: ReferenceRecord[]
    output: AssembledOutput
}

export interface WorkbookRunResult extends PipelineRunResult {
    workbook: Buffer
}

interface FragmentProblem {
    kind: RunIssueKind
    code: string
    message: string
}

interface FragmentOutcome {
    fragment: DocumentFragment
    translated?: TranslatedFragment
    extraction?: FragmentExtraction
    problems: FragmentProblem[]
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}

@injectable()
export class SpecPipeline {
    constructor(
        @inject(TOKENS.PipelineConfig) private readonly config: PipelineConfig,
        @inject(TOKENS.LlmClient) private readonly llm: ILlmClient,
        @inject(DocumentRelevanceFilter) private readonly relevanceFilter: DocumentRelevanceFilter,
        @inject(LanguageNormalizer) private readonly languageNormalizer: LanguageNormalizer,
        @inject(SpecExtractionEngine) private readonly extractionEngine: SpecExtractionEngine,
        @inject(TerminologyNormalizer) private readonly terminologyNormalizer: TerminologyNormalizer,
        @inject(TemplateMapper) private readonly templateMapper: TemplateMapper,
        @inject(ProvenanceTracker) private readonly provenanceTracker: ProvenanceTracker,
        @inject(WorkbookWriter) private readonly workbookWriter: WorkbookWriter,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * Read slots from an xlsx template, run the pipeline and write the populated workbook.
     */
    async runWithTemplate(fragments: readonly DocumentFragment[], templateBuffer: Buffer): Promise<WorkbookRunResult> {
        let slots: TemplateSlot[]
        try {
            slots = await readTemplateSlots(templateBuffer)
        } catch (error) {
            this.reportAbort(error, 'template')
            throw error
        }
        const result = await this.run(fragments, slots)
        const workbook = await this.workbookWriter.write(templateBuffer, result.output)
        return { ...result, workbook }
    }

    async run(fragments: readonly DocumentFragment[], slots: readonly TemplateSlot[]): Promise<PipelineRunResult> {
        const runId = this.telemetry.beginRun(this.config.workingLanguage)
        this.telemetry.trackPipelineEventStrict('Pipeline.Run.Started', { fragments: fragments.length, slots: slots.length })
        try {
            await this.preflight(slots)
            return await this.process(runId, fragments, slots)
        } catch (error) {
            this.reportAbort(error, 'run')
            throw error
        } finally {
            this.telemetry.endRun()
        }
    }

    private async preflight(slots: readonly TemplateSlot[]): Promise<void> {
        validateTemplateSlots(slots)
        if (this.config.preflight && !(await this.llm.healthCheck())) {
            throw new ConfigurationError('LLM provider health check failed', ['check credentials, endpoint and model deployment'])
        }
    }

    private async process(runId: string, fragments: readonly DocumentFragment[], slots: readonly TemplateSlot[]): Promise<PipelineRunResult> {
        const issues = new RunIssueLog()
        const accepted = this.acceptFragments(fragments, issues)

        const relevance = await this.screenDocuments(accepted, issues)
        const relevantFiles = new Set(relevance.filter((d) => d.relevant).map((d) => d.sourceFile))
        const kept = accepted.filter((f) => relevantFiles.has(f.sourceFile))

        const targetLabels = slots.map((slot) => splitLabelUnit(slot.labelText).name)
        const outcomes = await mapWithConcurrency(kept, this.config.fragmentConcurrency, (fragment) => this.processFragment(fragment, targetLabels))

        // Recorded in input order so the issue list does not depend on completion order
        const translated: TranslatedFragment[] = []
        const extractions: FragmentExtraction[] = []
        for (const outcome of outcomes) {
            if (outcome.translated) translated.push(outcome.translated)
            if (outcome.extraction) extractions.push(outcome.extraction)
            for (const problem of outcome.problems) {
                issues.record(problem.kind, problem.code, outcome.fragment.sourceFile, problem.message, outcome.fragment.locator)
            }
        }

        const instances: ExtractedSpecInstance[] = extractions.flatMap((e) => e.instances)
        const canonical = await this.terminologyNormalizer.canonicalize(instances)
        const mappings = await this.templateMapper.map(canonical.specs, slots)
        const fragmentsById = new Map(translated.map((t) => [t.ref.fragmentId, t]))
        const references = this.provenanceTracker.track(canonical.specs, mappings, fragmentsById, canonical.resolutions)

        const output = assembleOutput(
            canonical.specs,
            mappings,
            slots,
            references,
            {
                fragments: fragments.length,
                nativeFragments: translated.filter((t) => t.translationStatus === 'native').length,
                translatedFragments: translated.filter((t) => t.translationStatus === 'translated').length,
                failedTranslations: translated.filter((t) => t.translationStatus === 'failed').length,
                failedExtractions: extractions.filter((e) => e.status === 'failed').length,
                filteredDocuments: relevance.filter((d) => !d.relevant).length,
                instances: instances.length
            },
            issues.list()
        )

        const { issues: runIssues, ...counts } = output.summary
        this.telemetry.trackPipelineEventStrict('Pipeline.Run.Completed', { ...counts, issues: runIssues.length })

        return { runId, relevance, translated, extractions, canonical, mappings, references, output }
    }

    /**
     * Enforce the parser contract: non-empty locator and text, unique fragment ids.
     */
    private acceptFragments(fragments: readonly DocumentFragment[], issues: RunIssueLog): DocumentFragment[] {
        const accepted: DocumentFragment[] = []
        const seen = new Set<string>()
        for (const fragment of fragments) {
            let code: string | undefined
            let message = ''
            if (!fragment.locator.trim()) {
                code = 'EmptyLocator'
                message = 'fragment has an empty locator'
            } else if (!fragment.rawText.trim()) {
                code = 'EmptyText'
                message = 'fragment has no text'
            } else if (seen.has(fragmentIdOf(fragment))) {
                code = 'ParseFailure'
                message = `duplicate fragment ${fragmentIdOf(fragment)}`
            }

            if (code) {
                issues.record('parse', code, fragment.sourceFile, message, fragment.locator)
                this.telemetry.trackPipelineEventStrict('Fragment.Input.Rejected', {
                    sourceFile: fragment.sourceFile,
                    locator: fragment.locator,
                    code
                })
                continue
            }
            seen.add(fragmentIdOf(fragment))
            accepted.push(fragment)
        }
        return accepted
    }

    private async screenDocuments(fragments: readonly DocumentFragment[], issues: RunIssueLog): Promise<RelevanceDecision[]> {
        const byFile = new Map<string, DocumentFragment[]>()
        for (const fragment of fragments) {
            const group = byFile.get(fragment.sourceFile) ?? []
            group.push(fragment)
            byFile.set(fragment.sourceFile, group)
        }
        const files = [...byFile.keys()].sort(compareNatural)

        const decisions = await mapWithConcurrency(files, this.config.fragmentConcurrency, (file) =>
            this.relevanceFilter.assess(file, byFile.get(file) ?? [])
        )
        for (const decision of decisions) {
            if (!decision.relevant) {
                issues.record('relevance', 'DocumentFiltered', decision.sourceFile, decision.reason)
            }
        }
        return decisions
    }

    private async processFragment(fragment: DocumentFragment, targetLabels: readonly string[]): Promise<FragmentOutcome> {
        const problems: FragmentProblem[] = []

        let translated: TranslatedFragment
        try {
            translated = await this.languageNormalizer.normalize(fragment)
        } catch (error) {
            console.warn(`Language normalization failed for ${fragmentIdOf(fragment)}:`, errorMessage(error))
            problems.push({ kind: 'translation', code: 'InternalError', message: errorMessage(error) })
            return { fragment, problems }
        }
        if (translated.translationStatus === 'failed') {
            problems.push({
                kind: 'translation',
                code: 'TranslationFailure',
                message: translated.failureDetail ?? 'translation failed'
            })
        }

        try {
            const extraction = await this.extractionEngine.extract(translated, targetLabels)
            if (extraction.status === 'failed') {
                problems.push({
                    kind: 'extraction',
                    code: 'ExtractionFailure',
                    message: extraction.failureDetail ?? 'extraction failed'
                })
            }
            return { fragment, translated, extraction, problems }
        } catch (error) {
            console.warn(`Extraction failed for ${fragmentIdOf(fragment)}:`, errorMessage(error))
            problems.push({ kind: 'extraction', code: 'InternalError', message: errorMessage(error) })
            return { fragment, translated, problems }
        }
    }

    private reportAbort(error: unknown, stage: string): void {
        const code = error instanceof PipelineException ? error.code : 'InternalError'
        const attributes = buildErrorAttributes(code, errorMessage(error))
        console.error(`Pipeline run aborted (${stage}): ${attributes.errorMessage}`)
        this.telemetry.trackPipelineEventStrict('Pipeline.Run.Aborted', { stage, ...attributes })
        if (error instanceof Error) {
            this.telemetry.trackException(error, { stage, errorCode: attributes.errorCode })
        }
    }
}
