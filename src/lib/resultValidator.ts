/**
 * Post-run validation: is the paired result internally consistent?
 * Issues are reported, never thrown; the caller decides whether to log or abort.
 */

import type { PairedResult } from '../types'

export interface ResultValidation {
  consistent: boolean
  issues: string[]
}

function overlap(a: string[], b: string[]): string[] {
  const set = new Set(a)
  return b.filter((x) => set.has(x))
}

export function validatePairedResult(result: PairedResult): ResultValidation {
  const issues: string[] = []
  const { respondents, questions, legend, combined } = result

  if (combined.rows.length !== respondents.common.length)
    issues.push(`Combined table has ${combined.rows.length} rows; expected ${respondents.common.length} common respondents.`)
  if (result.before.rows.length !== result.after.rows.length)
    issues.push('Filtered pre and post tables differ in row count.')
  if (legend.length !== questions.length) issues.push('Legend does not list every compared question.')
  legend.forEach((entry, i) => {
    const nr = String(i + 1).padStart(2, '0')
    if (entry.beforeCode !== `before_${nr}` || entry.afterCode !== `after_${nr}`)
      issues.push(`Legend entry ${i + 1} has codes ${entry.beforeCode}/${entry.afterCode}.`)
    if (entry.question !== questions[i]) issues.push(`Legend entry ${i + 1} is out of question order.`)
  })
  if (result.questionStats.length !== questions.length)
    issues.push('Question statistics do not cover every compared question.')
  if (result.respondentStats.length !== respondents.common.length)
    issues.push('Respondent statistics do not cover every common respondent.')

  const shared = [
    ...overlap(respondents.common, respondents.beforeOnly),
    ...overlap(respondents.common, respondents.afterOnly),
    ...overlap(respondents.beforeOnly, respondents.afterOnly),
  ]
  if (shared.length) issues.push(`Respondent split is not disjoint (${shared.length} shared).`)

  for (const s of result.questionStats) {
    if (s.n < 2 && !Number.isNaN(s.statistic)) issues.push(`"${s.question}" reports a statistic from fewer than 2 pairs.`)
    if (!Number.isNaN(s.pvalue) && (s.pvalue < 0 || s.pvalue > 1)) issues.push(`"${s.question}" has p-value outside [0, 1].`)
  }

  return { consistent: issues.length === 0, issues }
}
