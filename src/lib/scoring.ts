/**
 * Scoring table: question text -> rank per Likert category.
 * Built once per run from the Scoring sheet and passed to every preparer call.
 */

import { CATEGORY_LABELS, type CategoryLabel, type CellValue, type RankMap, type ScoringTable, type SurveyTable } from '../types'
import { ConfigurationError } from './errors'

export const QUESTION_COLUMN = 'question'
export const SCORING_COLUMNS = [QUESTION_COLUMN, ...CATEGORY_LABELS]

const MIN_RANK = 0
const MAX_RANK = 4

/** Collapse whitespace runs so copy-pasted labels like 'Strongly  agree (SA)' still match. */
export function normalizeCategory(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

function findCategory(value: string): CategoryLabel | undefined {
  return CATEGORY_LABELS.find((label) => label === value)
}

function toRank(value: CellValue, question: string, label: string): number {
  const n = typeof value === 'number' ? value : Number(String(value ?? '').trim())
  if (value === null || value === '' || !Number.isInteger(n))
    throw new ConfigurationError(`Scoring for "${question}" has no integer rank for "${label}".`)
  if (n < MIN_RANK || n > MAX_RANK)
    throw new ConfigurationError(`Scoring for "${question}" ranks "${label}" as ${n}; expected ${MIN_RANK}-${MAX_RANK}.`)
  return n
}

/** Build an immutable ScoringTable from the rows of the scoring sheet. */
export function parseScoringTable(table: SurveyTable): ScoringTable {
  const missing = SCORING_COLUMNS.filter((c) => !table.columns.includes(c))
  if (missing.length)
    throw new ConfigurationError(`Scoring table is missing column(s): ${missing.join(', ')}.`)

  const questions: string[] = []
  const ranks: Record<string, RankMap> = {}
  for (const row of table.rows) {
    const raw = row[QUESTION_COLUMN]
    const question = raw == null ? '' : String(raw).trim()
    if (!question) continue
    if (Object.hasOwn(ranks, question)) throw new ConfigurationError(`Scoring table lists "${question}" twice.`)
    const rank = (label: CategoryLabel) => toRank(row[label] ?? null, question, label)
    const map: RankMap = {
      'Strongly agree (SA)': rank('Strongly agree (SA)'),
      'Agree (A)': rank('Agree (A)'),
      'Neutral (N)': rank('Neutral (N)'),
      'Disagree (D)': rank('Disagree (D)'),
      'Strongly Disagree (SD)': rank('Strongly Disagree (SD)'),
    }
    questions.push(question)
    ranks[question] = Object.freeze(map)
  }
  if (!questions.length) throw new ConfigurationError('Scoring table contains no questions.')

  return Object.freeze({ questions: Object.freeze(questions), ranks: Object.freeze(ranks) })
}

/** Rank for one answer cell; null for blank or unrecognized answers. */
export function resolveRank(value: CellValue, rankMap: RankMap): number | null {
  if (value === null) return null
  const label = findCategory(normalizeCategory(String(value)))
  return label ? rankMap[label] : null
}

/** Replace answers in scored columns by their rank. Other columns pass through. Input is not modified. */
export function toRanks(table: SurveyTable, scoring: ScoringTable): SurveyTable {
  const scored = table.columns.filter((c) => Object.hasOwn(scoring.ranks, c))
  const rows = table.rows.map((row) => {
    const out = { ...row }
    for (const question of scored) out[question] = resolveRank(row[question] ?? null, scoring.ranks[question])
    return out
  })
  return { columns: [...table.columns], rows }
}

/** Scored questions present in the table, in scoring table order. */
export function scoredQuestions(columns: readonly string[], scoring: ScoringTable): string[] {
  const present = new Set(columns)
  return scoring.questions.filter((q) => present.has(q))
}
