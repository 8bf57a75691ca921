/**
 * Extraction response schema (Zod validation)
 *
 * Model output is an untrusted payload. A response is accepted only when every record carries
 * a name, a numeric value, a unit and a confidence in [0,1]; otherwise the whole response is
 * rejected and the caller retries with a corrective instruction.
 *
 * Accepted shapes: a bare JSON array of records, or `{ "specs": [...] }` (what JSON-mode chat
 * completions produce). Markdown code fences around the JSON are tolerated.
 */
import { z } from 'zod'

/** Plain decimal number written as a string, e.g. "1000" or "-0.25" */
const NUMERIC_STRING = /^[-+]?\d+(\.\d+)?$/

const NumericValueSchema = z.union([
    z.number().finite(),
    z
        .string()
        .trim()
        .regex(NUMERIC_STRING, 'value must be a plain number')
        .transform((s) => Number(s))
])

export const ExtractionRecordSchema = z.object({
    spec_name: z.string().trim().min(1),
    value: NumericValueSchema,
    unit: z.string().trim(),
    condition: z
        .string()
        .trim()
        .nullish()
        .transform((c) => (c ? c : undefined)),
    confidence: z.number().min(0).max(1),
    source_text: z.string().trim().default('')
})
export type ExtractionRecord = z.infer<typeof ExtractionRecordSchema>

function unwrapSpecsEnvelope(payload: unknown): unknown {
    if (typeof payload === 'object' && payload !== null && !Array.isArray(payload) && 'specs' in payload) {
        return payload.specs
    }
    return payload
}

export const ExtractionResponseSchema = z.preprocess(unwrapSpecsEnvelope, z.array(ExtractionRecordSchema))

export type ExtractionParseResult = { status: 'valid'; records: ExtractionRecord[] } | { status: 'rejected'; reason: string }

const MAX_REPORTED_ISSUES = 5

/**
 * Remove a surrounding ```json ... ``` fence if present.
 */
export function stripCodeFences(content: string): string {
    const trimmed = content.trim()
    if (!trimmed.startsWith('```')) return trimmed
    const firstNewline = trimmed.indexOf('\n')
    if (firstNewline === -1) return ''
    const body = trimmed.slice(firstNewline + 1)
    const closing = body.lastIndexOf('```')
    return (closing === -1 ? body : body.slice(0, closing)).trim()
}

export function parseExtractionResponse(content: string): ExtractionParseResult {
    const body = stripCodeFences(content)
    let payload: unknown
    try {
        payload = JSON.parse(body)
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        return { status: 'rejected', reason: `response is not valid JSON (${detail})` }
    }

    const parsed = ExtractionResponseSchema.safeParse(payload)
    if (!parsed.success) {
        const issues = parsed.error.issues
            .slice(0, MAX_REPORTED_ISSUES)
            .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        return { status: 'rejected', reason: issues.join('; ') }
    }

    return { status: 'valid', records: parsed.data }
}
