/**
 * Prompt templates for the pipeline's three model calls: translation, spec extraction and
 * document relevance. Each template carries a version and a content hash so a run summary can
 * record exactly which instruction text produced its results.
 */
import { computeContentHash } from '../hash.js'

export type PromptTemplateName = 'translation.v1' | 'extraction.v1' | 'extraction.corrective.v1' | 'relevance.v1'

export interface PromptTemplateMeta {
    name: PromptTemplateName
    version: string
    hash: string
    purpose: string
    body: string
}

const templates: Omit<PromptTemplateMeta, 'hash'>[] = [
    {
        name: 'translation.v1',
        version: '1.0.0',
        purpose: 'Translate one document fragment into the working language.',
        body: [
            'You are a technical translator for display and cover-glass supplier documentation (automotive and consumer displays).',
            'Translate the user text from {{sourceLanguage}} into {{targetLanguage}}.',
            'Keep every number, tolerance, unit, symbol (≥, ≤, ±, :1) and part number exactly as written.',
            'Use the established industry term for specification names (for example "Leuchtdichte" is "Luminance", "Kontrastverhältnis" is "Contrast Ratio").',
            'Preserve line breaks and table layout. Return only the translated text with no commentary.'
        ].join('\n')
    },
    {
        name: 'extraction.v1',
        version: '1.0.0',
        purpose: 'Extract numeric specification records from one working-language fragment.',
        body: [
            'You extract numeric engineering specifications from supplier documents for displays and cover glass.',
            'Return JSON only: an object {"specs": [...]} where each record has',
            '  "spec_name": the specification name as written in the text,',
            '  "value": a single number (no units, no ranges, no symbols),',
            '  "unit": the unit as written ("" when the value is dimensionless),',
            '  "condition": measurement condition or null,',
            '  "confidence": your confidence between 0 and 1 that the record is correct,',
            '  "source_text": the exact snippet the record was taken from.',
            'For a minimum or maximum ("≥ 1000") report the bound as the value. For a ratio such as "1500:1" report 1500 with unit ":1".',
            'Only report specifications that are stated with a number. If there are none return {"specs": []}.',
            '{{targetSpecs}}'
        ].join('\n')
    },
    {
        name: 'extraction.corrective.v1',
        version: '1.0.0',
        purpose: 'Follow-up instruction after a response failed validation.',
        body: [
            'Your previous response could not be accepted: {{reason}}.',
            'Answer again with JSON only, exactly in the form {"specs": [...]}, every record having spec_name, a numeric value, unit, condition, confidence between 0 and 1 and source_text.'
        ].join('\n')
    },
    {
        name: 'relevance.v1',
        version: '1.0.0',
        purpose: 'Decide whether a document contains technical specifications worth extracting.',
        body: [
            'You screen supplier documents before specification extraction.',
            'Decide whether the excerpt contains technical specifications of a display, panel or cover glass with numeric values.',
            'Marketing copy, contracts, quotations and meeting notes are not relevant.',
            'Return JSON only: {"is_relevant": true|false, "reason": "<short reason>", "confidence": <0..1>}.'
        ].join('\n')
    }
]

let cache: PromptTemplateMeta[] | null = null

export function listTemplates(): PromptTemplateMeta[] {
    if (!cache) cache = templates.map((t) => ({ ...t, hash: computeContentHash(t.body) }))
    return cache
}

export function getTemplate(name: PromptTemplateName): PromptTemplateMeta {
    const template = listTemplates().find((t) => t.name === name)
    if (!template) throw new Error(`Unknown prompt template ${name}`)
    return template
}

/**
 * Replace `{{placeholder}}` tokens. Unknown placeholders are left in place.
 */
export function renderTemplate(body: string, variables: Readonly<Record<string, string>>): string {
    return body.replace(/\{\{(\w+)\}\}/g, (token, key: string) => variables[key] ?? token)
}
