/**
 * Pseudonymous respondent tokens.
 * BLAKE2b with an 8-byte digest: keyless, stable across runs, so the same student
 * gets the same token in the pre and post survey.
 */

import { blake2bHex } from 'blakejs'
import type { CellValue, SurveyTable } from '../types'

const DIGEST_BYTES = 8
const encoder = new TextEncoder()

/** 16-char lowercase hex token for a raw identifier (trimmed, case preserved). */
export function anonymize(rawId: string): string {
  return blake2bHex(encoder.encode(rawId.trim()), undefined, DIGEST_BYTES)
}

/** Drop one leading character (code point) when it is not a digit, e.g. 's1234567' -> '1234567'. */
export function stripLeadingNonDigit(id: string): string {
  if (id.length === 0 || /^\d/.test(id)) return id
  return Array.from(id).slice(1).join('')
}

function tokenFor(value: CellValue): CellValue {
  if (value === null || value === '') return null
  return anonymize(String(value))
}

/**
 * Add `toColumn` holding the token of `onColumn`, placed directly before `onColumn`.
 * Returns the input unchanged when `onColumn` is absent.
 */
export function anonymizeColumn(table: SurveyTable, onColumn: string, toColumn: string): SurveyTable {
  const ix = table.columns.indexOf(onColumn)
  if (ix < 0) return table
  const rest = table.columns.filter((c) => c !== toColumn)
  const at = rest.indexOf(onColumn)
  const columns = [...rest.slice(0, at), toColumn, ...rest.slice(at)]
  const rows = table.rows.map((row) => ({ ...row, [toColumn]: tokenFor(row[onColumn] ?? null) }))
  return { columns, rows }
}

/** Remove a column from both the column list and every row. */
export function dropColumn(table: SurveyTable, column: string): SurveyTable {
  if (!table.columns.includes(column)) return table
  return {
    columns: table.columns.filter((c) => c !== column),
    rows: table.rows.map((row) => Object.fromEntries(Object.entries(row).filter(([key]) => key !== column))),
  }
}
