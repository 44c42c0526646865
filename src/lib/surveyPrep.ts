/**
 * Survey preparation: clean the identifier column, anonymize it and rank the answers.
 * Raw input tables are never modified.
 */

import type { AnonymizeLevel, DataRow, ScoringTable, SurveyTable } from '../types'
import { anonymizeColumn, dropColumn, stripLeadingNonDigit } from './anonymize'
import { ConfigurationError } from './errors'
import { toRanks } from './scoring'

export interface PrepareOptions {
  idColumn: string
  scoring: ScoringTable
  /** Remove one leading non-digit character from ids (e.g. 's1234567') */
  stripLeadingNonDigit?: boolean
  /** Column that receives the pseudonymous token */
  anonymousColumn: string
}

export interface PreparedSurvey {
  table: SurveyTable
  dropped: { blank: number; duplicate: number }
}

function cleanId(value: DataRow[string] | undefined, strip: boolean): string | null {
  if (value === null || value === undefined) return null
  const text = String(value).trim()
  if (!text) return null
  return strip ? stripLeadingNonDigit(text) : text
}

/** Drop rows without id, normalize ids, keep the first row per id. */
export function cleanIdentifiers(
  table: SurveyTable,
  idColumn: string,
  strip = false
): PreparedSurvey {
  if (!table.columns.includes(idColumn))
    throw new ConfigurationError(`Identifier column "${idColumn}" not found. Available columns: ${table.columns.join(', ')}`)

  const seen = new Set<string>()
  const rows: DataRow[] = []
  let blank = 0
  let duplicate = 0
  for (const row of table.rows) {
    const id = cleanId(row[idColumn], strip)
    if (id === null) {
      blank++
      continue
    }
    if (seen.has(id)) {
      duplicate++
      continue
    }
    seen.add(id)
    rows.push({ ...row, [idColumn]: id })
  }
  return { table: { columns: [...table.columns], rows }, dropped: { blank, duplicate } }
}

/** Clean ids, add the anonymous id column next to the raw one, and convert answers to ranks. */
export function prepareSurvey(raw: SurveyTable, options: PrepareOptions): PreparedSurvey {
  const { idColumn, scoring, anonymousColumn } = options
  const cleaned = cleanIdentifiers(raw, idColumn, options.stripLeadingNonDigit ?? false)
  const anonymous = anonymizeColumn(cleaned.table, idColumn, anonymousColumn)
  return { table: toRanks(anonymous, scoring), dropped: cleaned.dropped }
}

/** Keep raw id, token, or both, according to the configured level. */
export function applyAnonymizeLevel(
  table: SurveyTable,
  level: AnonymizeLevel,
  idColumn: string,
  anonymousColumn: string
): SurveyTable {
  switch (level) {
    case 'raw':
      return dropColumn(table, anonymousColumn)
    case 'both':
      return table
    case 'anonymous':
      return dropColumn(table, idColumn)
  }
}

/** Remove survey-tool metadata (timestamps, e-mail, name) from output tables. */
export function dropMetadataColumns(table: SurveyTable, columns: readonly string[]): SurveyTable {
  return columns.reduce((acc, column) => dropColumn(acc, column), table)
}
