/** One cell of a survey table: text, a numeric rank, or missing */
export type CellValue = string | number | null

/** Row of data keyed by column name */
export type DataRow = Record<string, CellValue>

/** Tabular survey data with explicit column order */
export interface SurveyTable {
  columns: string[]
  rows: DataRow[]
}

/** Likert answer categories as they appear in survey exports and the scoring sheet */
export const CATEGORY_LABELS = [
  'Strongly agree (SA)',
  'Agree (A)',
  'Neutral (N)',
  'Disagree (D)',
  'Strongly Disagree (SD)',
] as const

export type CategoryLabel = (typeof CATEGORY_LABELS)[number]

/** Category label -> integer rank for one question. Direction encodes polarity. */
export type RankMap = Readonly<Record<CategoryLabel, number>>

/** Question text -> rank map, plus question declaration order */
export interface ScoringTable {
  readonly questions: readonly string[]
  readonly ranks: Readonly<Record<string, RankMap>>
}

/**
 * Which identifier columns survive into cleaned output:
 * raw id only, raw id and token, or token only.
 */
export type AnonymizeLevel = 'raw' | 'both' | 'anonymous'

/** Respondents of two waves split by presence */
export interface RespondentSplit {
  common: string[]
  beforeOnly: string[]
  afterOnly: string[]
}

/** Paired t-test outcome. NaN when undefined (fewer than 2 pairs). */
export interface PairedStatistic {
  n: number
  statistic: number
  pvalue: number
}

export interface QuestionStat extends PairedStatistic {
  question: string
  beforeMean: number
  beforeSd: number
  afterMean: number
  afterSd: number
}

export interface RespondentStat extends PairedStatistic {
  respondent: string
}

export interface LegendEntry {
  question: string
  beforeCode: string
  afterCode: string
}

export interface PairedResult {
  idField: string
  /** Common scored questions, in scoring table order */
  questions: string[]
  respondents: RespondentSplit
  questionStats: QuestionStat[]
  respondentStats: RespondentStat[]
  legend: LegendEntry[]
  /** Post-intersection single-wave tables, original question names */
  before: SurveyTable
  after: SurveyTable
  /** Wide table: id, before_01, after_01, before_02, after_02, ... */
  combined: SurveyTable
}

/** Named table ready to be written as one sheet */
export interface NamedTable {
  name: string
  table: SurveyTable
}
