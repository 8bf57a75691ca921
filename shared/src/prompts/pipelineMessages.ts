/**
 * Chat message builders for the pipeline's model calls.
 */
import { EXTRACTION_FEW_SHOT_EXAMPLES } from './fewShotExamples.js'
import { getTemplate, renderTemplate } from './templates.js'

export type ChatRole = 'system' | 'user' | 'assistant'

export interface ChatMessage {
    role: ChatRole
    content: string
}

export const DEFAULT_DOMAIN_HINT =
    'Documents are supplier specifications for automotive and consumer display modules and their cover glass (optical, mechanical and environmental properties).'

export interface TranslationPromptInput {
    text: string
    sourceLanguageName: string
    targetLanguageName: string
}

export function buildTranslationMessages(input: TranslationPromptInput): ChatMessage[] {
    const system = renderTemplate(getTemplate('translation.v1').body, {
        sourceLanguage: input.sourceLanguageName,
        targetLanguage: input.targetLanguageName
    })
    return [
        { role: 'system', content: system },
        { role: 'user', content: input.text }
    ]
}

export interface ExtractionPromptInput {
    text: string
    /** Template labels the caller is looking for; listed as targets but not a filter */
    targetLabels: readonly string[]
    domainHint?: string
}

export interface ExtractionCorrection {
    previousContent: string
    reason: string
}

function targetSpecsLine(labels: readonly string[]): string {
    if (labels.length === 0) return 'Report every numeric specification you find.'
    return `Target specifications (report these when present, and any other numeric specification you find): ${labels.join(', ')}.`
}

/**
 * Fixed instruction + domain context + few-shot turns + the fragment. When `correction` is given
 * the rejected response and a corrective instruction are appended as the last two turns.
 */
export function buildExtractionMessages(input: ExtractionPromptInput, correction?: ExtractionCorrection): ChatMessage[] {
    const instruction = renderTemplate(getTemplate('extraction.v1').body, {
        targetSpecs: targetSpecsLine(input.targetLabels)
    })
    const messages: ChatMessage[] = [{ role: 'system', content: `${instruction}\n\nContext: ${input.domainHint ?? DEFAULT_DOMAIN_HINT}` }]

    for (const example of EXTRACTION_FEW_SHOT_EXAMPLES) {
        messages.push({ role: 'user', content: example.input })
        messages.push({ role: 'assistant', content: example.output })
    }

    messages.push({ role: 'user', content: input.text })

    if (correction) {
        messages.push({ role: 'assistant', content: correction.previousContent })
        messages.push({
            role: 'user',
            content: renderTemplate(getTemplate('extraction.corrective.v1').body, { reason: correction.reason })
        })
    }

    return messages
}

export function buildRelevanceMessages(excerpt: string): ChatMessage[] {
    return [
        { role: 'system', content: getTemplate('relevance.v1').body },
        { role: 'user', content: excerpt }
    ]
}
