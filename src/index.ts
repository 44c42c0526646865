export * from './types'
export { anonymize, anonymizeColumn, dropColumn, stripLeadingNonDigit } from './lib/anonymize'
export { ConfigurationError, PartialDataError } from './lib/errors'
export { normalizeCategory, parseScoringTable, resolveRank, toRanks } from './lib/scoring'
export { applyAnonymizeLevel, cleanIdentifiers, dropMetadataColumns, prepareSurvey } from './lib/surveyPrep'
export type { PrepareOptions, PreparedSurvey } from './lib/surveyPrep'
export { commonQuestions, pairedTest, pairedTTest, splitRespondents, tTwoSidedPValue } from './lib/pairedStats'
export { validatePairedResult } from './lib/resultValidator'
export { buildFindingsReport, getHeadline, isSignificant } from './lib/findingsReport'
export { analysisTables, respondentStatusTable, ANALYSIS_SHEETS } from './lib/resultTables'
export { readTable, writeWorkbook, parseCsv } from './lib/tableIO'
export { findSurveyFiles, determineSurveyDataName, outputNames, removePreviousResults } from './lib/surveyFiles'
export { loadScoringTable, runSurveyFolder, runWaves } from './lib/waveRunner'
export { resolveConfig, type RunConfig, type RunOptions } from './lib/config'
