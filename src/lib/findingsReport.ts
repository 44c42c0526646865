/**
 * Findings report: order per-question results for reading and build headlines.
 * All text comes from computed statistics only.
 */

import type { PairedStatistic, PairedResult, QuestionStat } from '../types'

export const DEFAULT_ALPHA = 0.05

export interface Finding {
  stat: QuestionStat
  significant: boolean
  headline: string
}

export interface FindingsReport {
  alpha: number
  findings: Finding[]
  significantCount: number
  /** Questions whose statistic could not be computed */
  undefinedCount: number
}

export function isSignificant(stat: PairedStatistic, alpha = DEFAULT_ALPHA): boolean {
  return !Number.isNaN(stat.pvalue) && stat.pvalue < alpha
}

export function formatPValue(p: number): string {
  if (Number.isNaN(p)) return 'n/a'
  return p < 0.001 ? '< 0.001' : `= ${p.toFixed(3)}`
}

export function formatStatistic(t: number): string {
  if (Number.isNaN(t)) return 'n/a'
  if (!Number.isFinite(t)) return t > 0 ? '+inf' : '-inf'
  return t.toFixed(2)
}

/** e.g. 'I trust others: t(11) = -2.31, p = 0.041' */
export function getHeadline(stat: QuestionStat): string {
  if (Number.isNaN(stat.statistic)) return `${stat.question}: not enough pairs (n = ${stat.n})`
  return `${stat.question}: t(${stat.n - 1}) = ${formatStatistic(stat.statistic)}, p ${formatPValue(stat.pvalue)}`
}

function rank(f: Finding): number {
  return Number.isNaN(f.stat.pvalue) ? Number.MAX_VALUE : f.stat.pvalue
}

/** Significant findings first, then by ascending p; undefined statistics last. Ties keep question order. */
export function buildFindingsReport(result: PairedResult, alpha = DEFAULT_ALPHA): FindingsReport {
  const findings = result.questionStats.map((stat) => ({
    stat,
    significant: isSignificant(stat, alpha),
    headline: getHeadline(stat),
  }))
  findings.sort((a, b) => Number(b.significant) - Number(a.significant) || rank(a) - rank(b))
  return {
    alpha,
    findings,
    significantCount: findings.filter((f) => f.significant).length,
    undefinedCount: findings.filter((f) => Number.isNaN(f.stat.statistic)).length,
  }
}
