/**
 * Template Reader
 *
 * Reads TemplateSlots from the first worksheet of an xlsx template: column A holds the label,
 * column B of the same row receives the value. A leading header row ("Specification Type",
 * "Item", ...) is skipped. A trailing unit in parentheses or brackets becomes the slot's
 * expected unit.
 */
import { normalizeTermKey, splitLabelUnit, TemplateValidationError, type TemplateSlot } from '@specmap/shared'
import ExcelJS from 'exceljs'
import { Readable } from 'node:stream'
import { validateTemplateSlots } from '../services/TemplateMapper.js'

export const HEADER_LABELS: readonly string[] = ['specification type', 'spec type', 'item', 'specification', 'parameter', 'spec name']

const LABEL_COLUMN = 1
const VALUE_COLUMN_LETTER = 'B'

function isHeaderLabel(label: string): boolean {
    return HEADER_LABELS.includes(normalizeTermKey(label))
}

export async function loadWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
    const workbook = new ExcelJS.Workbook()
    try {
        await workbook.xlsx.read(Readable.from([buffer]))
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        throw new TemplateValidationError('Template is not a readable xlsx workbook', [detail])
    }
    return workbook
}

export function readSlotsFromWorksheet(sheet: ExcelJS.Worksheet): TemplateSlot[] {
    const slots: TemplateSlot[] = []
    let firstLabelSeen = false

    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
        const label = row.getCell(LABEL_COLUMN).text.trim()
        if (!label) return

        const isFirst = !firstLabelSeen
        firstLabelSeen = true
        if (isFirst && isHeaderLabel(label)) return

        const { unit } = splitLabelUnit(label)
        const slot: TemplateSlot = { labelText: label, cellCoordinate: `${VALUE_COLUMN_LETTER}${rowNumber}` }
        slots.push(unit ? { ...slot, expectedUnit: unit } : slot)
    })

    return slots
}

/**
 * @throws TemplateValidationError when the workbook is unreadable, has no worksheet or defines no slots
 */
export async function readTemplateSlots(buffer: Buffer): Promise<TemplateSlot[]> {
    const workbook = await loadWorkbook(buffer)
    const sheet = workbook.worksheets[0]
    if (!sheet) {
        throw new TemplateValidationError('Template has no worksheet')
    }
    const slots = readSlotsFromWorksheet(sheet)
    validateTemplateSlots(slots)
    return slots
}
