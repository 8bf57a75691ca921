/**
 * Relevance screening response: `{ is_relevant, reason, confidence? }`.
 */
import { z } from 'zod'
import { stripCodeFences } from './extractionSchema.js'

export const RelevanceResponseSchema = z.object({
    is_relevant: z.boolean(),
    reason: z.string().trim().default(''),
    confidence: z.number().min(0).max(1).optional()
})
export type RelevanceResponse = z.infer<typeof RelevanceResponseSchema>

/**
 * Parse a relevance verdict; returns null when the content is not a valid verdict.
 */
export function parseRelevanceResponse(content: string): RelevanceResponse | null {
    let payload: unknown
    try {
        payload = JSON.parse(stripCodeFences(content))
    } catch {
        return null
    }
    const parsed = RelevanceResponseSchema.safeParse(payload)
    return parsed.success ? parsed.data : null
}
