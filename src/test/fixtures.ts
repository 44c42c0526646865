import type { ScoringTable, SurveyTable } from '../types'
import { parseScoringTable } from '../lib/scoring'

export const TRUST = 'I trust others in this course'
export const RELUCTANT = 'I feel reluctant to speak openly'
export const CONNECTED = 'I feel connected to others in this course'
export const ID_COLUMN = 'Your student number'
export const ANON = 'student_anon'

const positive = [4, 3, 2, 1, 0]
const negative = [0, 1, 2, 3, 4]

export const SCORING_HEADER = [
  'question',
  'Strongly agree (SA)',
  'Agree (A)',
  'Neutral (N)',
  'Disagree (D)',
  'Strongly Disagree (SD)',
]

export function scoringSheet(entries: [string, number[]][]): SurveyTable {
  return {
    columns: [...SCORING_HEADER],
    rows: entries.map(([question, ranks]) => ({
      question,
      'Strongly agree (SA)': ranks[0],
      'Agree (A)': ranks[1],
      'Neutral (N)': ranks[2],
      'Disagree (D)': ranks[3],
      'Strongly Disagree (SD)': ranks[4],
    })),
  }
}

/** TRUST (positive), RELUCTANT (negative), CONNECTED (positive), in that order */
export function makeScoring(): ScoringTable {
  return parseScoringTable(
    scoringSheet([
      [TRUST, positive],
      [RELUCTANT, negative],
      [CONNECTED, positive],
    ])
  )
}

/** Scoring CSV text with the same three questions */
export const SCORING_CSV = [
  SCORING_HEADER.join(','),
  `${TRUST},4,3,2,1,0`,
  `${RELUCTANT},0,1,2,3,4`,
  `${CONNECTED},4,3,2,1,0`,
].join('\n')

export function table(columns: string[], rows: (string | number | null)[][]): SurveyTable {
  return {
    columns,
    rows: rows.map((values) => Object.fromEntries(columns.map((c, j) => [c, values[j] ?? null]))),
  }
}
