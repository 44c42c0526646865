import { describe, it, expect } from 'vitest'
import { applyAnonymizeLevel, cleanIdentifiers, dropMetadataColumns, prepareSurvey } from './surveyPrep'
import { anonymize } from './anonymize'
import { ConfigurationError } from './errors'
import { ANON, ID_COLUMN, RELUCTANT, TRUST, makeScoring, table } from '../test/fixtures'

function rawSurvey() {
  return table(
    ['ID', 'Email', ID_COLUMN, TRUST, RELUCTANT],
    [
      [1, 'a@example.org', ' s1001 ', 'Agree (A)', 'Agree (A)'],
      [2, 'b@example.org', null, 'Agree (A)', 'Neutral (N)'],
      [3, 'c@example.org', '1002', 'Neutral (N)', ''],
      [4, 'd@example.org', 's1001', 'Disagree (D)', 'Disagree (D)'],
      [5, 'e@example.org', '   ', 'Agree (A)', 'Agree (A)'],
      [6, 'f@example.org', 1003, 'Strongly agree (SA)', 'Strongly Disagree (SD)'],
    ]
  )
}

const options = { idColumn: ID_COLUMN, scoring: makeScoring(), anonymousColumn: ANON }

describe('surveyPrep', () => {
  describe('cleanIdentifiers', () => {
    it('drops blank ids, trims, and keeps the first row per id', () => {
      const { table: out, dropped } = cleanIdentifiers(rawSurvey(), ID_COLUMN)
      expect(out.rows.map((r) => r[ID_COLUMN])).toEqual(['s1001', '1002', '1003'])
      expect(out.rows.map((r) => r.ID)).toEqual([1, 3, 6])
      expect(dropped).toEqual({ blank: 2, duplicate: 1 })
    })

    it('strips a leading letter before deduplicating', () => {
      const t = table([ID_COLUMN], [['s1002'], ['1002'], ['x1003']])
      const { table: out } = cleanIdentifiers(t, ID_COLUMN, true)
      expect(out.rows.map((r) => r[ID_COLUMN])).toEqual(['1002', '1003'])
    })

    it('fails on a missing identifier column', () => {
      expect(() => cleanIdentifiers(rawSurvey(), 'Student ID')).toThrow(ConfigurationError)
    })
  })

  describe('prepareSurvey', () => {
    it('adds the anonymous id next to the raw id and ranks the answers', () => {
      const { table: out } = prepareSurvey(rawSurvey(), options)
      expect(out.columns).toEqual(['ID', 'Email', ANON, ID_COLUMN, TRUST, RELUCTANT])
      expect(out.rows.map((r) => r[ANON])).toEqual([anonymize('s1001'), anonymize('1002'), anonymize('1003')])
      expect(out.rows.map((r) => r[TRUST])).toEqual([3, 2, 4])
      expect(out.rows.map((r) => r[RELUCTANT])).toEqual([1, null, 4])
    })

    it('gives the same token for the same person in both waves after stripping', () => {
      const pre = table([ID_COLUMN, TRUST], [['s1001', 'Agree (A)']])
      const post = table([ID_COLUMN, TRUST], [['1001', 'Agree (A)']])
      const a = prepareSurvey(pre, { ...options, stripLeadingNonDigit: true }).table.rows[0][ANON]
      const b = prepareSurvey(post, { ...options, stripLeadingNonDigit: true }).table.rows[0][ANON]
      expect(a).toBe(b)
      expect(a).toBe(anonymize('1001'))
    })

    it('does not modify the raw table', () => {
      const raw = rawSurvey()
      prepareSurvey(raw, options)
      expect(raw.columns).toEqual(['ID', 'Email', ID_COLUMN, TRUST, RELUCTANT])
      expect(raw.rows).toHaveLength(6)
      expect(raw.rows[0][ID_COLUMN]).toBe(' s1001 ')
      expect(raw.rows[0][TRUST]).toBe('Agree (A)')
    })

    it('fails fast when the identifier column is missing', () => {
      expect(() => prepareSurvey(rawSurvey(), { ...options, idColumn: 'Student ID' })).toThrow(/Student ID/)
    })
  })

  describe('applyAnonymizeLevel', () => {
    const prepared = () => prepareSurvey(rawSurvey(), options).table

    it('anonymous keeps only the token', () => {
      expect(applyAnonymizeLevel(prepared(), 'anonymous', ID_COLUMN, ANON).columns).toEqual(['ID', 'Email', ANON, TRUST, RELUCTANT])
    })

    it('raw keeps only the raw id', () => {
      expect(applyAnonymizeLevel(prepared(), 'raw', ID_COLUMN, ANON).columns).toEqual(['ID', 'Email', ID_COLUMN, TRUST, RELUCTANT])
    })

    it('both keeps raw id and token', () => {
      expect(applyAnonymizeLevel(prepared(), 'both', ID_COLUMN, ANON).columns).toEqual(['ID', 'Email', ANON, ID_COLUMN, TRUST, RELUCTANT])
    })
  })

  it('dropMetadataColumns removes listed columns that exist', () => {
    const out = dropMetadataColumns(rawSurvey(), ['ID', 'Email', 'Start time'])
    expect(out.columns).toEqual([ID_COLUMN, TRUST, RELUCTANT])
    expect(Object.keys(out.rows[0])).toEqual([ID_COLUMN, TRUST, RELUCTANT])
  })
})
