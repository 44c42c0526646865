/**
 * Turn a PairedResult into named tables, one per output sheet, in a fixed order:
 * Question stats, Respondent stats, Legend, Before, After, Combined (+ Summary).
 */

import type { CellValue, NamedTable, PairedResult, RespondentSplit, SurveyTable } from '../types'
import type { FindingsReport } from './findingsReport'

export const ANALYSIS_SHEETS = ['Question stats', 'Respondent stats', 'Legend', 'Before', 'After', 'Combined'] as const
export const SUMMARY_SHEET = 'Summary'
export const RESPONDENT_SHEET = 'Respondents'

export type RespondentStatus = 'common' | 'before-only' | 'after-only'

/** Spreadsheet-safe number: NaN becomes an empty cell, infinities become text. */
export function cell(value: number): CellValue {
  if (Number.isNaN(value)) return null
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf'
  return value
}

export function analysisTables(result: PairedResult, report?: FindingsReport): NamedTable[] {
  const { idField } = result
  const questionStats: SurveyTable = {
    columns: ['question', 'n', 'statistic', 'pvalue', 'before_mean', 'before_sd', 'after_mean', 'after_sd'],
    rows: result.questionStats.map((s) => ({
      question: s.question,
      n: s.n,
      statistic: cell(s.statistic),
      pvalue: cell(s.pvalue),
      before_mean: cell(s.beforeMean),
      before_sd: cell(s.beforeSd),
      after_mean: cell(s.afterMean),
      after_sd: cell(s.afterSd),
    })),
  }
  const respondentStats: SurveyTable = {
    columns: [idField, 'n', 'statistic', 'pvalue'],
    rows: result.respondentStats.map((s) => ({
      [idField]: s.respondent,
      n: s.n,
      statistic: cell(s.statistic),
      pvalue: cell(s.pvalue),
    })),
  }
  const legend: SurveyTable = {
    columns: ['Question', 'Before_question_ID', 'After_question_ID'],
    rows: result.legend.map((e) => ({
      Question: e.question,
      Before_question_ID: e.beforeCode,
      After_question_ID: e.afterCode,
    })),
  }
  const [qs, rs, lg, bf, af, cb] = ANALYSIS_SHEETS
  const tables: NamedTable[] = [
    { name: qs, table: questionStats },
    { name: rs, table: respondentStats },
    { name: lg, table: legend },
    { name: bf, table: result.before },
    { name: af, table: result.after },
    { name: cb, table: result.combined },
  ]
  if (report) {
    tables.push({
      name: SUMMARY_SHEET,
      table: {
        columns: ['Finding', 'Significant'],
        rows: report.findings.map((f) => ({ Finding: f.headline, Significant: f.significant ? 'yes' : 'no' })),
      },
    })
  }
  return tables
}

/** Every respondent token with its presence across the two waves. */
export function respondentStatusTable(split: RespondentSplit, idField: string): SurveyTable {
  const entries: [string, RespondentStatus][] = [
    ...split.common.map((id): [string, RespondentStatus] => [id, 'common']),
    ...split.beforeOnly.map((id): [string, RespondentStatus] => [id, 'before-only']),
    ...split.afterOnly.map((id): [string, RespondentStatus] => [id, 'after-only']),
  ]
  return {
    columns: [idField, 'status'],
    rows: entries.map(([id, status]) => ({ [idField]: id, status })),
  }
}
