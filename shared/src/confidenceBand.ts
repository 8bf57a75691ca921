/**
 * Confidence bands for output color-coding.
 *
 * Confidence is the model-reported value; the bands only bucket it for display.
 */

export type ConfidenceBand = 'high' | 'medium' | 'low'

export const HIGH_CONFIDENCE_MIN = 0.8
export const MEDIUM_CONFIDENCE_MIN = 0.5

/** Fill colors (ARGB without alpha) per band: green, yellow, red. */
export const CONFIDENCE_BAND_COLORS: Readonly<Record<ConfidenceBand, string>> = {
    high: 'C6EFCE',
    medium: 'FFEB9C',
    low: 'FFC7CE'
}

export function confidenceBandOf(confidence: number): ConfidenceBand {
    if (confidence >= HIGH_CONFIDENCE_MIN) return 'high'
    if (confidence >= MEDIUM_CONFIDENCE_MIN) return 'medium'
    return 'low'
}

/** "95%" style rendering used in annotations and tables. */
export function formatConfidence(confidence: number): string {
    return `${Math.round(confidence * 100)}%`
}
