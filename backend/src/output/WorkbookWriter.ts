/**
 * Workbook Writer
 *
 * Lays an assembled output into a copy of the template workbook:
 * - first sheet (renamed "Spec Summary"): values at mapped coordinates, a confidence-band fill
 *   and a note pointing back to the source text
 * - "Reference": every reference record
 * - "Unmatched": canonical specs without an accepted slot
 * - "Run Summary": counts and the issue list
 *
 * The template's own cells other than mapped value cells are left as they are. A template sheet
 * that already carries one of these names is kept, and the written sheet takes the first free
 * "<name> (n)" instead.
 */
import { CONFIDENCE_BAND_COLORS, formatConfidence, TemplateValidationError } from '@specmap/shared'
import ExcelJS from 'exceljs'
import { inject, injectable } from 'inversify'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { loadWorkbook } from '../template/TemplateReader.js'
import type { AssembledOutput, RunSummary } from './OutputAssembler.js'

export const SUMMARY_SHEET_NAME = 'Spec Summary'
export const REFERENCE_SHEET_NAME = 'Reference'
export const UNMATCHED_SHEET_NAME = 'Unmatched'
export const RUN_SUMMARY_SHEET_NAME = 'Run Summary'
export const NO_UNMATCHED_MESSAGE = 'No unmatched specifications found.'

export const REFERENCE_HEADERS = [
    'Standard Name',
    'Status',
    'Slot',
    'Source File',
    'Location',
    'Raw Name',
    'Value',
    'Unit',
    'Condition',
    'Confidence',
    'Original Text',
    'Translated Text',
    'Excerpt',
    'Flags'
]

export const UNMATCHED_HEADERS = ['Standard Name', 'Value', 'Unit', 'Condition', 'Confidence', 'Best Slot Score', 'Non-standard', 'Sources']

const TEXT_COLUMNS = new Set(['Original Text', 'Translated Text', 'Excerpt'])
const HEADER_FILL_ARGB = 'FFD9D9D9'

function styleHeaderRow(row: ExcelJS.Row): void {
    row.font = { bold: true }
    row.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_ARGB } }
}

/** Sheet names compare case-insensitively in a workbook. */
export function freeSheetName(workbook: ExcelJS.Workbook, name: string, owner?: ExcelJS.Worksheet): string {
    const taken = new Set(workbook.worksheets.filter((sheet) => sheet !== owner).map((sheet) => sheet.name.toLowerCase()))
    let candidate = name
    for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
        candidate = `${name} (${n})`
    }
    return candidate
}

function addOutputWorksheet(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
    return workbook.addWorksheet(freeSheetName(workbook, name))
}

export function summaryRows(summary: RunSummary): Array<[string, number]> {
    return [
        ['Fragments', summary.fragments],
        ['Native fragments', summary.nativeFragments],
        ['Translated fragments', summary.translatedFragments],
        ['Failed translations', summary.failedTranslations],
        ['Failed extractions', summary.failedExtractions],
        ['Filtered documents', summary.filteredDocuments],
        ['Extracted instances', summary.instances],
        ['Canonical specs', summary.canonicalSpecs],
        ['Mapped', summary.mapped],
        ['Unmatched', summary.unmatched],
        ['Empty slots', summary.emptySlots]
    ]
}

@injectable()
export class WorkbookWriter {
    constructor(@inject(TelemetryService) private readonly telemetry: TelemetryService) {}

    async write(templateBuffer: Buffer, output: AssembledOutput): Promise<Buffer> {
        const workbook = await loadWorkbook(templateBuffer)
        const summarySheet = workbook.worksheets[0]
        if (!summarySheet) {
            throw new TemplateValidationError('Template has no worksheet')
        }
        if (summarySheet.name.toLowerCase() !== SUMMARY_SHEET_NAME.toLowerCase()) {
            summarySheet.name = freeSheetName(workbook, SUMMARY_SHEET_NAME, summarySheet)
        }

        for (const populated of output.populated) {
            const cell = summarySheet.getCell(populated.slot.cellCoordinate)
            cell.value = populated.cellValue
            cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: `FF${CONFIDENCE_BAND_COLORS[populated.band]}` } }
            cell.note = populated.annotation
        }

        this.writeReferenceSheet(workbook, output)
        this.writeUnmatchedSheet(workbook, output)
        this.writeRunSummarySheet(workbook, output.summary)

        const buffer = Buffer.from(await workbook.xlsx.writeBuffer())
        this.telemetry.trackPipelineEventStrict('Output.Workbook.Written', {
            populated: output.populated.length,
            references: output.references.length,
            unmatched: output.unmatched.length,
            bytes: buffer.length
        })
        return buffer
    }

    private writeReferenceSheet(workbook: ExcelJS.Workbook, output: AssembledOutput): void {
        const sheet = addOutputWorksheet(workbook, REFERENCE_SHEET_NAME)
        styleHeaderRow(sheet.addRow(REFERENCE_HEADERS))
        for (const record of output.references) {
            sheet.addRow([
                record.standardName,
                record.status,
                record.slotRef ?? '',
                record.sourceFile,
                record.locator,
                record.rawSpecName,
                record.value,
                record.unit,
                record.condition ?? '',
                formatConfidence(record.confidence),
                record.originalText,
                record.translatedText,
                record.sourceExcerpt,
                record.flags.join(', ')
            ])
        }
        REFERENCE_HEADERS.forEach((header, index) => {
            sheet.getColumn(index + 1).width = TEXT_COLUMNS.has(header) ? 60 : 18
        })
    }

    private writeUnmatchedSheet(workbook: ExcelJS.Workbook, output: AssembledOutput): void {
        const sheet = addOutputWorksheet(workbook, UNMATCHED_SHEET_NAME)
        if (output.unmatched.length === 0) {
            sheet.addRow([NO_UNMATCHED_MESSAGE])
            return
        }
        styleHeaderRow(sheet.addRow(UNMATCHED_HEADERS))
        for (const row of output.unmatched) {
            sheet.addRow([
                row.standardName,
                row.value,
                row.unit,
                row.condition ?? '',
                formatConfidence(row.confidence),
                Number(row.bestScore.toFixed(3)),
                row.nonStandard ? 'yes' : 'no',
                row.sources.join('; ')
            ])
        }
    }

    private writeRunSummarySheet(workbook: ExcelJS.Workbook, summary: RunSummary): void {
        const sheet = addOutputWorksheet(workbook, RUN_SUMMARY_SHEET_NAME)
        styleHeaderRow(sheet.addRow(['Metric', 'Count']))
        for (const row of summaryRows(summary)) {
            sheet.addRow(row)
        }

        sheet.addRow([])
        styleHeaderRow(sheet.addRow(['Issue', 'Code', 'Source File', 'Location', 'Message']))
        if (summary.issues.length === 0) {
            sheet.addRow(['none'])
            return
        }
        for (const issue of summary.issues) {
            sheet.addRow([issue.kind, issue.code, issue.sourceFile, issue.locator ?? '', issue.message])
        }
    }
}
