/**
 * Reading survey exports (.xlsx via SheetJS, .csv via Papa Parse) into SurveyTables,
 * and writing named tables as sheets of one workbook.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import Papa from 'papaparse'
import * as XLSX from 'xlsx'
import type { CellValue, DataRow, NamedTable, SurveyTable } from '../types'
import { ConfigurationError } from './errors'

export const TABLE_EXTENSIONS = ['.xlsx', '.csv'] as const

function toCell(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return null
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (raw instanceof Date) return raw.toISOString()
  const trimmed = String(raw).trim()
  if (trimmed === '') return null
  const num = Number(trimmed)
  if (!Number.isNaN(num) && String(num) === trimmed) return num
  return trimmed
}

/** First row is the header; blank headers become Column_N. */
function fromMatrix(matrix: unknown[][]): SurveyTable {
  if (matrix.length === 0) return { columns: [], rows: [] }
  const columns = matrix[0].map((h, j) => (h != null ? String(h).trim() : '') || `Column_${j + 1}`)
  const rows: DataRow[] = []
  for (let i = 1; i < matrix.length; i++) {
    const raw = matrix[i]
    if (!raw.some((v) => toCell(v) !== null)) continue
    const row: DataRow = {}
    columns.forEach((c, j) => {
      row[c] = toCell(raw[j])
    })
    rows.push(row)
  }
  return { columns, rows }
}

export function parseCsv(csvText: string): SurveyTable {
  if (!csvText) return { columns: [], rows: [] }
  const parsed = Papa.parse<string[]>(csvText, { skipEmptyLines: true })
  const data = Array.isArray(parsed.data) ? parsed.data : []
  return fromMatrix(data)
}

export function sheetToTable(sheet: XLSX.WorkSheet): SurveyTable {
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false, raw: true })
  return fromMatrix(matrix)
}

/** Read one sheet (by name when present, else the first) from workbook bytes. */
export function parseWorkbook(data: Buffer, sheetName?: string): SurveyTable {
  const wb = XLSX.read(data, { type: 'buffer' })
  const name = sheetName && wb.SheetNames.includes(sheetName) ? sheetName : wb.SheetNames[0]
  if (!name) return { columns: [], rows: [] }
  return sheetToTable(wb.Sheets[name])
}

export async function readTable(file: string, sheetName?: string): Promise<SurveyTable> {
  const ext = path.extname(file).toLowerCase()
  if (ext === '.csv') return parseCsv(await fs.readFile(file, 'utf8'))
  if (ext === '.xlsx') return parseWorkbook(await fs.readFile(file), sheetName)
  throw new ConfigurationError(`Unsupported table format: ${path.basename(file)}`)
}

export function tableToSheet(table: SurveyTable): XLSX.WorkSheet {
  const aoa: CellValue[][] = [table.columns, ...table.rows.map((r) => table.columns.map((c) => r[c] ?? null))]
  return XLSX.utils.aoa_to_sheet(aoa)
}

export function tablesToWorkbook(tables: NamedTable[]): XLSX.WorkBook {
  const wb = XLSX.utils.book_new()
  for (const { name, table } of tables) XLSX.utils.book_append_sheet(wb, tableToSheet(table), name)
  return wb
}

export async function writeWorkbook(file: string, tables: NamedTable[]): Promise<void> {
  const data: Buffer = XLSX.write(tablesToWorkbook(tables), { type: 'buffer', bookType: 'xlsx' })
  await fs.writeFile(file, data)
}
