/**
 * Paired comparison of a pre and post survey wave.
 * Aligns both waves on respondent and scored question, then runs a paired t-test
 * per question (across respondents) and per respondent (across questions).
 */

import { gammaln, mean, sampleStandardDeviation } from 'simple-statistics'
import type {
  CellValue,
  DataRow,
  LegendEntry,
  PairedResult,
  PairedStatistic,
  QuestionStat,
  RespondentSplit,
  RespondentStat,
  ScoringTable,
  SurveyTable,
} from '../types'
import { PartialDataError } from './errors'
import { scoredQuestions } from './scoring'

export interface PairedOptions {
  /** Column holding the pseudonymous respondent token */
  idField: string
  scoring: ScoringTable
}

/** Continued fraction for the incomplete beta function (modified Lentz). */
function betaContinuedFraction(a: number, b: number, x: number): number {
  const maxIterations = 10000
  const eps = 3e-16
  const tiny = 1e-300
  const qab = a + b
  const qap = a + 1
  const qam = a - 1
  let c = 1
  let d = 1 - (qab * x) / qap
  if (Math.abs(d) < tiny) d = tiny
  d = 1 / d
  let h = d
  for (let m = 1; m <= maxIterations; m++) {
    const m2 = 2 * m
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2))
    d = 1 + aa * d
    if (Math.abs(d) < tiny) d = tiny
    c = 1 + aa / c
    if (Math.abs(c) < tiny) c = tiny
    d = 1 / d
    h *= d * c
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2))
    d = 1 + aa * d
    if (Math.abs(d) < tiny) d = tiny
    c = 1 + aa / c
    if (Math.abs(c) < tiny) c = tiny
    d = 1 / d
    const delta = d * c
    h *= delta
    if (Math.abs(delta - 1) < eps) break
  }
  return h
}

/** Regularized incomplete beta I_x(a, b). */
export function regularizedBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0
  if (x >= 1) return 1
  const front = Math.exp(gammaln(a + b) - gammaln(a) - gammaln(b) + a * Math.log(x) + b * Math.log(1 - x))
  if (x < (a + 1) / (a + b + 2)) return (front * betaContinuedFraction(a, b, x)) / a
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b
}

/** Two-sided p-value of a Student t statistic with `df` degrees of freedom. */
export function tTwoSidedPValue(t: number, df: number): number {
  if (Number.isNaN(t) || !(df >= 1)) return NaN
  if (!Number.isFinite(t)) return 0
  return regularizedBeta(df / (df + t * t), df / 2, 0.5)
}

function numeric(value: CellValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

/**
 * Paired-samples t-test on two aligned vectors. Pairs with a missing side are skipped.
 * d = after - before; t = mean(d) / (sd(d) / sqrt(n)); df = n - 1.
 * Fewer than 2 pairs gives NaN. Constant non-zero differences give ±Infinity with p = 0.
 */
export function pairedTest(before: (number | null)[], after: (number | null)[]): PairedStatistic {
  const diffs: number[] = []
  const len = Math.min(before.length, after.length)
  for (let i = 0; i < len; i++) {
    const b = before[i]
    const a = after[i]
    if (b !== null && a !== null) diffs.push(a - b)
  }
  const n = diffs.length
  if (n < 2) return { n, statistic: NaN, pvalue: NaN }
  const meanDiff = mean(diffs)
  const sdDiff = sampleStandardDeviation(diffs)
  if (sdDiff === 0) {
    if (meanDiff === 0) return { n, statistic: NaN, pvalue: NaN }
    return { n, statistic: meanDiff > 0 ? Infinity : -Infinity, pvalue: 0 }
  }
  const statistic = meanDiff / (sdDiff / Math.sqrt(n))
  return { n, statistic, pvalue: tTwoSidedPValue(statistic, n - 1) }
}

function describe(values: number[]): { mean: number; sd: number } {
  return {
    mean: values.length ? mean(values) : NaN,
    sd: values.length > 1 ? sampleStandardDeviation(values) : NaN,
  }
}

function idOf(row: DataRow, idField: string): string | null {
  const v = row[idField]
  if (v === null || v === undefined || v === '') return null
  return String(v)
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/** Stable ascending sort on the id column; rows without id are left out. */
export function sortById(table: SurveyTable, idField: string): SurveyTable {
  const keyed = table.rows
    .map((row) => ({ row, id: idOf(row, idField) }))
    .filter((x): x is { row: DataRow; id: string } => x.id !== null)
  keyed.sort((x, y) => compareIds(x.id, y.id))
  return { columns: [...table.columns], rows: keyed.map((x) => x.row) }
}

/** Scored questions present in both waves, in scoring table order. */
export function commonQuestions(
  before: SurveyTable,
  after: SurveyTable,
  scoring: ScoringTable,
  idField?: string
): string[] {
  const inAfter = new Set(after.columns)
  return scoredQuestions(before.columns, scoring).filter((q) => inAfter.has(q) && q !== idField)
}

/** Split respondents into common, before-only and after-only (each sorted). */
export function splitRespondents(before: SurveyTable, after: SurveyTable, idField: string): RespondentSplit {
  const ids = (t: SurveyTable) => new Set(t.rows.map((r) => idOf(r, idField)).filter((id): id is string => id !== null))
  const b = ids(before)
  const a = ids(after)
  const sorted = (xs: Iterable<string>) => Array.from(xs).sort(compareIds)
  return {
    common: sorted([...b].filter((id) => a.has(id))),
    beforeOnly: sorted([...b].filter((id) => !a.has(id))),
    afterOnly: sorted([...a].filter((id) => !b.has(id))),
  }
}

/** Short codes before_01/after_01, ... in question order. */
export function questionCodes(questions: string[]): LegendEntry[] {
  return questions.map((question, i) => {
    const nr = String(i + 1).padStart(2, '0')
    return { question, beforeCode: `before_${nr}`, afterCode: `after_${nr}` }
  })
}

function firstById(table: SurveyTable, idField: string): Map<string, DataRow> {
  const map = new Map<string, DataRow>()
  for (const row of table.rows) {
    const id = idOf(row, idField)
    if (id !== null && !map.has(id)) map.set(id, row)
  }
  return map
}

function restrict(rows: Map<string, DataRow>, ids: string[], idField: string, questions: string[]): SurveyTable {
  const out: DataRow[] = []
  for (const id of ids) {
    const row = rows.get(id)
    if (!row) continue
    const r: DataRow = { [idField]: id }
    for (const q of questions) r[q] = row[q] ?? null
    out.push(r)
  }
  return { columns: [idField, ...questions], rows: out }
}

/**
 * Compare two prepared waves. Throws PartialDataError when the waves share no
 * scored question or no respondent; undefined statistics are NaN.
 */
export function pairedTTest(before: SurveyTable, after: SurveyTable, options: PairedOptions): PairedResult {
  const { idField, scoring } = options
  const sortedBefore = sortById(before, idField)
  const sortedAfter = sortById(after, idField)

  const questions = commonQuestions(sortedBefore, sortedAfter, scoring, idField)
  if (!questions.length) throw new PartialDataError('Pre and post survey have no scored questions in common.')
  const respondents = splitRespondents(sortedBefore, sortedAfter, idField)
  if (!respondents.common.length) throw new PartialDataError('Pre and post survey have no respondents in common.')

  const beforeRows = firstById(sortedBefore, idField)
  const afterRows = firstById(sortedAfter, idField)
  const filteredBefore = restrict(beforeRows, respondents.common, idField, questions)
  const filteredAfter = restrict(afterRows, respondents.common, idField, questions)

  const legend = questionCodes(questions)
  const afterById = firstById(filteredAfter, idField)
  const combinedRows: DataRow[] = []
  for (const b of filteredBefore.rows) {
    const id = idOf(b, idField)
    const a = id === null ? undefined : afterById.get(id)
    if (id === null || !a) continue
    const row: DataRow = { [idField]: id }
    for (const { question, beforeCode, afterCode } of legend) {
      row[beforeCode] = b[question] ?? null
      row[afterCode] = a[question] ?? null
    }
    combinedRows.push(row)
  }
  if (combinedRows.length !== respondents.common.length)
    throw new Error(`Joined ${combinedRows.length} rows for ${respondents.common.length} common respondents.`)
  const combined: SurveyTable = {
    columns: [idField, ...legend.flatMap((e) => [e.beforeCode, e.afterCode])],
    rows: combinedRows,
  }

  const questionStats: QuestionStat[] = legend.map(({ question, beforeCode, afterCode }) => {
    const b = combinedRows.map((r) => numeric(r[beforeCode]))
    const a = combinedRows.map((r) => numeric(r[afterCode]))
    const complete = b.flatMap((x, i) => {
      const y = a[i]
      return x !== null && y !== null ? [[x, y]] : []
    })
    const pre = describe(complete.map(([x]) => x))
    const post = describe(complete.map(([, y]) => y))
    return {
      question,
      ...pairedTest(b, a),
      beforeMean: pre.mean,
      beforeSd: pre.sd,
      afterMean: post.mean,
      afterSd: post.sd,
    }
  })

  const respondentStats: RespondentStat[] = combinedRows.map((row) => ({
    respondent: String(row[idField]),
    ...pairedTest(
      legend.map((e) => numeric(row[e.beforeCode])),
      legend.map((e) => numeric(row[e.afterCode]))
    ),
  }))

  return {
    idField,
    questions,
    respondents,
    questionStats,
    respondentStats,
    legend,
    before: filteredBefore,
    after: filteredAfter,
    combined,
  }
}
