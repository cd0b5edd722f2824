import path from 'node:path'

import ExcelJS from 'exceljs'
import type { Cell, Worksheet } from 'exceljs'

import { ScheduleError, formatErrorMessage } from '../errors.js'
import type { ScheduleRow } from './types.js'

function cellText(cell: Cell): string {
  const value = cell.value
  if (value == null) return ''
  if (typeof value === 'number') return String(value)
  return cell.text.trim()
}

function cellDuration(cell: Cell): string | number | null {
  const value = cell.value
  if (value == null) return null
  if (typeof value === 'number') return value
  const text = cell.text.trim()
  return text ? text : null
}

/** Reads columns A (type), B (title) and C (duration); row 1 is a header. */
export function readWorksheet(worksheet: Worksheet): ScheduleRow[] {
  const rows: ScheduleRow[] = []
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return
    const type = cellText(row.getCell(1))
    const title = cellText(row.getCell(2))
    if (!type && !title) return
    rows.push({ type, title, duration: cellDuration(row.getCell(3)) })
  })
  return rows
}

export async function loadScheduleRows(filePath: string): Promise<ScheduleRow[]> {
  const workbook = new ExcelJS.Workbook()
  const extension = path.extname(filePath).toLowerCase()
  let worksheet: Worksheet | undefined
  try {
    if (extension === '.csv') {
      worksheet = await workbook.csv.readFile(filePath)
    } else {
      await workbook.xlsx.readFile(filePath)
      worksheet = workbook.worksheets[0]
    }
  } catch (error) {
    throw new ScheduleError(`Unable to read schedule ${filePath}: ${formatErrorMessage(error)}`, {
      cause: error,
    })
  }
  if (!worksheet) {
    throw new ScheduleError(`Schedule ${filePath} has no worksheets`)
  }
  return readWorksheet(worksheet)
}
