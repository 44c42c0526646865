import type { AnonymizeLevel } from '../types'
import { ConfigurationError } from './errors'
import { DEFAULT_ALPHA } from './findingsReport'

export const ANONYMOUS_ID = 'student_anon'
/** Identifier column in the survey exports. It never reaches anonymous output. */
export const DEFAULT_STUDENT_COLUMN = 'Your student number'
/** Survey-tool metadata left out of cleaned output */
export const DROP_COLUMNS = ['ID', 'Start time', 'Completion time', 'Email', 'Name', 'Last modified time'] as const

export const ANALYSIS_OUTPUT_BASE = 'analysis'
export const CLEANED_OUTPUT_BASE = 'cleaned'
export const DATA_OUTPUT_BASENAME = 'data_survey'
export const CLEAN_SHEET_PRE_SURVEY = 'Clean pre-survey'
export const CLEAN_SHEET_POST_SURVEY = 'Clean post-survey'

export const SCORING_FILE_BASENAME = 'Scoring'
export const SCORING_SHEET = 'Scoring'

const LEVELS: readonly AnonymizeLevel[] = ['raw', 'both', 'anonymous']

export interface RunConfig {
  folder: string
  idColumn: string
  anonymousColumn: string
  level: AnonymizeLevel
  stripLeadingNonDigit: boolean
  /** Only write cleaned surveys; also accepts pre files without a post counterpart */
  cleanOnly: boolean
  overwrite: boolean
  alpha: number
}

export type RunOptions = Partial<Omit<RunConfig, 'folder' | 'level'>> & { folder: string; level?: string }

export function parseLevel(value: string): AnonymizeLevel {
  const level = LEVELS.find((l) => l === value)
  if (!level) throw new ConfigurationError(`Unknown anonymize level "${value}". Use one of: ${LEVELS.join(', ')}.`)
  return level
}

/** Merge CLI options over environment defaults over built-in defaults. */
export function resolveConfig(options: RunOptions, env: NodeJS.ProcessEnv = process.env): RunConfig {
  if (!options.folder) throw new ConfigurationError('No survey folder given.')
  const alpha = options.alpha ?? DEFAULT_ALPHA
  if (!(alpha > 0 && alpha < 1)) throw new ConfigurationError(`Significance level must be between 0 and 1, got ${alpha}.`)
  return {
    folder: options.folder,
    idColumn: options.idColumn || env.SURVEY_ID_COLUMN || DEFAULT_STUDENT_COLUMN,
    anonymousColumn: options.anonymousColumn || ANONYMOUS_ID,
    level: parseLevel(options.level || env.SURVEY_ANON_LEVEL || 'anonymous'),
    stripLeadingNonDigit: options.stripLeadingNonDigit ?? false,
    cleanOnly: options.cleanOnly ?? false,
    overwrite: options.overwrite ?? false,
    alpha,
  }
}
