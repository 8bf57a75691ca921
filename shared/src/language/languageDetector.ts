/**
 * Heuristic language detection for document fragments.
 *
 * 1. Script detection: Hangul → ko, Hiragana/Katakana → ja, other Han → zh.
 * 2. Latin-script texts are scored against stop-word and diacritic profiles
 *    (`shared/data/language-profiles.json`).
 *
 * Short texts (fewer than MIN_LETTERS letters) and texts with no evidence fall back to the caller's
 * default, which is normally the working language.
 */
import { readFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigurationError } from '../exceptions/pipelineExceptions.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const DEFAULT_LANGUAGE_PROFILES_PATH = join(__dirname, '..', '..', 'data', 'language-profiles.json')

export const MIN_LETTERS = 12

/** Share of letters that must belong to a CJK script before the script decides the language */
const SCRIPT_SHARE = 0.3

const LanguageProfileSchema = z.object({
    code: z.string().min(2),
    name: z.string().min(1),
    stopwords: z.array(z.string().min(1)),
    markers: z.string()
})
export type LanguageProfile = z.infer<typeof LanguageProfileSchema>

const LanguageProfileSetSchema = z.object({
    profiles: z.array(LanguageProfileSchema).min(1),
    scriptLanguages: z.record(z.string())
})
export type LanguageProfileSet = z.infer<typeof LanguageProfileSetSchema>

export type DetectionMethod = 'script' | 'profile' | 'fallback'

export interface LanguageDetection {
    language: string
    method: DetectionMethod
}

export function parseLanguageProfiles(payload: unknown): LanguageProfileSet {
    const parsed = LanguageProfileSetSchema.safeParse(payload)
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid language profiles',
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        )
    }
    return parsed.data
}

export async function loadLanguageProfiles(path: string = DEFAULT_LANGUAGE_PROFILES_PATH): Promise<LanguageProfileSet> {
    let payload: unknown
    try {
        payload = JSON.parse(await readFile(path, 'utf-8'))
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        throw new ConfigurationError(`Cannot load language profiles from ${path}`, [detail])
    }
    return parseLanguageProfiles(payload)
}

function countMatches(text: string, pattern: RegExp): number {
    return text.match(pattern)?.length ?? 0
}

function detectScript(text: string, letters: number): string | undefined {
    const hangul = countMatches(text, /\p{Script=Hangul}/gu)
    const kana = countMatches(text, /[\p{Script=Hiragana}\p{Script=Katakana}]/gu)
    const han = countMatches(text, /\p{Script=Han}/gu)

    if (hangul / letters >= SCRIPT_SHARE) return 'ko'
    if (kana > 0 && (kana + han) / letters >= SCRIPT_SHARE) return 'ja'
    if (han / letters >= SCRIPT_SHARE) return 'zh'
    return undefined
}

function scoreProfile(profile: LanguageProfile, tokens: readonly string[], lowered: string): number {
    const stopwords = new Set(profile.stopwords)
    let score = 0
    for (const token of tokens) {
        if (stopwords.has(token)) score += 2
    }
    for (const marker of profile.markers) {
        score += lowered.split(marker).length - 1
    }
    return score
}

/**
 * Detect the language of a fragment's text. Profiles are tried in file order; the first profile
 * with the highest score wins.
 */
export function detectLanguage(text: string, fallback: string, profiles: LanguageProfileSet): LanguageDetection {
    const letters = countMatches(text, /\p{L}/gu)
    if (letters < MIN_LETTERS) return { language: fallback, method: 'fallback' }

    const script = detectScript(text, letters)
    if (script) return { language: script, method: 'script' }

    const lowered = text.toLowerCase()
    const tokens = lowered.split(/[^\p{L}]+/u).filter(Boolean)

    let best: { code: string; score: number } | undefined
    for (const profile of profiles.profiles) {
        const score = scoreProfile(profile, tokens, lowered)
        if (score > 0 && (!best || score > best.score)) {
            best = { code: profile.code, score }
        }
    }

    return best ? { language: best.code, method: 'profile' } : { language: fallback, method: 'fallback' }
}

/**
 * Primary subtag of a language tag, lowercased: `en-US`, `en_GB` and `EN` all give `en`.
 */
export function primaryLanguageSubtag(tag: string): string {
    return tag.trim().toLowerCase().split(/[-_]/)[0]
}

/**
 * English display name for a language code ("de" → "German"). Unknown codes are returned unchanged.
 */
export function languageDisplayName(code: string, profiles: LanguageProfileSet): string {
    const normalized = code.toLowerCase()
    const profile = profiles.profiles.find((p) => p.code === normalized)
    if (profile) return profile.name
    return profiles.scriptLanguages[normalized] ?? code
}
