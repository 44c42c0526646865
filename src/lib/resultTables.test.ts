import { describe, it, expect } from 'vitest'
import { ANALYSIS_SHEETS, SUMMARY_SHEET, analysisTables, cell, respondentStatusTable } from './resultTables'
import { buildFindingsReport } from './findingsReport'
import { pairedTTest } from './pairedStats'
import { RELUCTANT, TRUST, makeScoring, table } from '../test/fixtures'

function result() {
  const before = table(['id', TRUST, RELUCTANT], [['a', 4, 4], ['b', 2, 2], ['c', 3, null]])
  const after = table(['id', TRUST, RELUCTANT], [['a', 0, 0], ['b', 3, 1], ['c', 3, 1]])
  return pairedTTest(before, after, { idField: 'id', scoring: makeScoring() })
}

describe('resultTables', () => {
  it('cell turns NaN into an empty cell and infinities into text', () => {
    expect(cell(NaN)).toBeNull()
    expect(cell(-Infinity)).toBe('-inf')
    expect(cell(Infinity)).toBe('inf')
    expect(cell(1.5)).toBe(1.5)
  })

  it('returns the six analysis tables in fixed order', () => {
    const tables = analysisTables(result())
    expect(tables.map((t) => t.name)).toEqual([...ANALYSIS_SHEETS])
    expect(tables[0].table.columns).toEqual(['question', 'n', 'statistic', 'pvalue', 'before_mean', 'before_sd', 'after_mean', 'after_sd'])
    expect(tables[1].table.columns).toEqual(['id', 'n', 'statistic', 'pvalue'])
    expect(tables[2].table.rows).toEqual([
      { Question: TRUST, Before_question_ID: 'before_01', After_question_ID: 'after_01' },
      { Question: RELUCTANT, Before_question_ID: 'before_02', After_question_ID: 'after_02' },
    ])
    expect(tables[5].table.columns).toEqual(['id', 'before_01', 'after_01', 'before_02', 'after_02'])
  })

  it('writes undefined statistics as empty cells', () => {
    const [, respondentStats] = analysisTables(result())
    // c has only one complete pair
    expect(respondentStats.table.rows[2]).toEqual({ id: 'c', n: 1, statistic: null, pvalue: null })
    expect(respondentStats.table.rows[0]).toEqual({ id: 'a', n: 2, statistic: '-inf', pvalue: 0 })
  })

  it('appends a summary when a report is given', () => {
    const r = result()
    const tables = analysisTables(r, buildFindingsReport(r))
    expect(tables).toHaveLength(7)
    expect(tables[6].name).toBe(SUMMARY_SHEET)
    expect(tables[6].table.columns).toEqual(['Finding', 'Significant'])
  })

  it('respondentStatusTable lists common, before-only and after-only', () => {
    const t = respondentStatusTable({ common: ['b'], beforeOnly: ['a'], afterOnly: ['c'] }, 'student_anon')
    expect(t.rows).toEqual([
      { student_anon: 'b', status: 'common' },
      { student_anon: 'a', status: 'before-only' },
      { student_anon: 'c', status: 'after-only' },
    ])
  })
})
