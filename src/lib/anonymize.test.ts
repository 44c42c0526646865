import { describe, it, expect } from 'vitest'
import { anonymize, anonymizeColumn, dropColumn, stripLeadingNonDigit } from './anonymize'
import { table } from '../test/fixtures'

describe('anonymize', () => {
  it('produces the 8-byte BLAKE2b digest as 16 lowercase hex chars', () => {
    expect(anonymize('s123495')).toBe('195c26771ad74539')
    expect(anonymize('123495')).toBe('a755c35dbf69b1ab')
    expect(anonymize('Ålesund')).toBe('f892e627f2d20a99')
  })

  it('is deterministic and ignores surrounding whitespace', () => {
    expect(anonymize('s123495')).toBe(anonymize('s123495'))
    expect(anonymize(' s123495 ')).toBe('195c26771ad74539')
  })

  it('preserves case', () => {
    expect(anonymize('S123495')).toBe('31f372c2c4a50a98')
  })

  it('has no collisions for 2000 distinct identifiers', () => {
    const ids = Array.from({ length: 2000 }, (_, i) => `s${String(1000000 + i)}`)
    const tokens = new Set(ids.map(anonymize))
    expect(tokens.size).toBe(ids.length)
    for (const t of tokens) expect(t).toMatch(/^[0-9a-f]{16}$/)
  })
})

describe('stripLeadingNonDigit', () => {
  it('removes exactly one leading non-digit character', () => {
    expect(stripLeadingNonDigit('s1234567')).toBe('1234567')
    expect(stripLeadingNonDigit('ab12')).toBe('b12')
  })

  it('removes a whole character outside the basic plane', () => {
    expect(stripLeadingNonDigit('\u{1D4AE}123')).toBe('123')
    expect(anonymize(stripLeadingNonDigit('\u{1D4AE}123'))).toBe(anonymize('123'))
  })

  it('leaves ids starting with a digit untouched', () => {
    expect(stripLeadingNonDigit('1234567')).toBe('1234567')
    expect(stripLeadingNonDigit('')).toBe('')
  })
})

describe('anonymizeColumn', () => {
  const data = () =>
    table(
      ['Name', 'Your student number', 'q1'],
      [
        ['Ann', 's123495', 'Agree (A)'],
        ['Bob', '123495', 'Disagree (D)'],
      ]
    )

  it('inserts the token column directly before the raw column', () => {
    const out = anonymizeColumn(data(), 'Your student number', 'anon')
    expect(out.columns).toEqual(['Name', 'anon', 'Your student number', 'q1'])
    expect(out.rows.map((r) => r.anon)).toEqual(['195c26771ad74539', 'a755c35dbf69b1ab'])
    expect(out.rows.map((r) => r.Name)).toEqual(['Ann', 'Bob'])
  })

  it('returns the table unchanged when the column is absent', () => {
    const input = data()
    const out = anonymizeColumn(input, 'My student number', 'anon')
    expect(out).toBe(input)
    expect(out.columns).toEqual(['Name', 'Your student number', 'q1'])
  })

  it('does not modify the input table', () => {
    const input = data()
    anonymizeColumn(input, 'Your student number', 'anon')
    expect(input.columns).toEqual(['Name', 'Your student number', 'q1'])
    expect(input.rows[0]).toEqual({ Name: 'Ann', 'Your student number': 's123495', q1: 'Agree (A)' })
  })

  it('can drop the raw column afterwards', () => {
    const out = dropColumn(anonymizeColumn(data(), 'Your student number', 'anon'), 'Your student number')
    expect(out.columns).toEqual(['Name', 'anon', 'q1'])
    expect('Your student number' in out.rows[0]).toBe(false)
  })
})
