/**
 * Few-shot extraction examples sent ahead of every fragment. They cover the shapes models
 * most often get wrong: bounds written with comparison signs, ratios, conditions and
 * tables that mix several specs on one line.
 */

export interface FewShotExample {
    input: string
    output: string
}

export const EXTRACTION_FEW_SHOT_EXAMPLES: readonly FewShotExample[] = [
    {
        input: 'Brightness: typ. 850 nits, min. 700 nits (center point)',
        output: JSON.stringify({
            specs: [
                {
                    spec_name: 'Brightness',
                    value: 850,
                    unit: 'nits',
                    condition: 'typical, center point',
                    confidence: 0.9,
                    source_text: 'Brightness: typ. 850 nits'
                },
                {
                    spec_name: 'Brightness',
                    value: 700,
                    unit: 'nits',
                    condition: 'minimum, center point',
                    confidence: 0.85,
                    source_text: 'min. 700 nits (center point)'
                }
            ]
        })
    },
    {
        input: 'Cover glass | Thickness 1.1 mm | CS ≥ 650 MPa | DOL ≥ 40 µm | Pencil hardness 9H',
        output: JSON.stringify({
            specs: [
                { spec_name: 'Thickness', value: 1.1, unit: 'mm', condition: null, confidence: 0.95, source_text: 'Thickness 1.1 mm' },
                { spec_name: 'CS', value: 650, unit: 'MPa', condition: 'minimum', confidence: 0.9, source_text: 'CS ≥ 650 MPa' },
                { spec_name: 'DOL', value: 40, unit: 'µm', condition: 'minimum', confidence: 0.9, source_text: 'DOL ≥ 40 µm' },
                { spec_name: 'Pencil hardness', value: 9, unit: 'H', condition: null, confidence: 0.85, source_text: 'Pencil hardness 9H' }
            ]
        })
    },
    {
        input: 'The supplier will confirm delivery dates after the design review.',
        output: JSON.stringify({ specs: [] })
    }
]
