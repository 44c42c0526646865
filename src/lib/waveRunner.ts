/**
 * Batch pipeline over all wave pairs in a folder.
 * Each pair is read, prepared, written as a cleaned workbook and, with a post
 * survey, compared into an analysis workbook. A failing pair is reported and
 * the remaining pairs still run.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import type { NamedTable, ScoringTable, SurveyTable } from '../types'
import {
  CLEAN_SHEET_POST_SURVEY,
  CLEAN_SHEET_PRE_SURVEY,
  DROP_COLUMNS,
  SCORING_FILE_BASENAME,
  SCORING_SHEET,
  type RunConfig,
} from './config'
import { ConfigurationError, PartialDataError, errorMessage } from './errors'
import { buildFindingsReport } from './findingsReport'
import * as log from './logger'
import { pairedTTest, splitRespondents } from './pairedStats'
import { analysisTables, RESPONDENT_SHEET, respondentStatusTable } from './resultTables'
import { validatePairedResult } from './resultValidator'
import { parseScoringTable } from './scoring'
import {
  determineSurveyDataName,
  fileExists,
  findSurveyFiles,
  outputNames,
  removePreviousResults,
  type SurveyPair,
} from './surveyFiles'
import { applyAnonymizeLevel, dropMetadataColumns, prepareSurvey } from './surveyPrep'
import { readTable, TABLE_EXTENSIONS, writeWorkbook } from './tableIO'

export type WaveStatus = 'analyzed' | 'cleaned' | 'skipped' | 'failed'

export interface WaveReport {
  dataName: string
  pair: SurveyPair
  status: WaveStatus
  outputs: string[]
  /** Non-fatal problems: skipped analysis, validation issues */
  notes: string[]
  error?: string
}

/** Load Scoring.xlsx (sheet 'Scoring') or Scoring.csv from the folder. */
export async function loadScoringTable(folder: string): Promise<ScoringTable> {
  for (const ext of TABLE_EXTENSIONS) {
    const file = path.join(folder, SCORING_FILE_BASENAME + ext)
    if (await fileExists(file)) return parseScoringTable(await readTable(file, SCORING_SHEET))
  }
  throw new ConfigurationError(`No scoring table (${SCORING_FILE_BASENAME}.xlsx or .csv) found in ${folder}.`)
}

function cleanedView(table: SurveyTable, config: RunConfig): SurveyTable {
  const leveled = applyAnonymizeLevel(table, config.level, config.idColumn, config.anonymousColumn)
  return dropMetadataColumns(leveled, DROP_COLUMNS)
}

async function loadWave(file: string, config: RunConfig, scoring: ScoringTable): Promise<SurveyTable> {
  const raw = await readTable(file)
  const prepared = prepareSurvey(raw, {
    idColumn: config.idColumn,
    scoring,
    stripLeadingNonDigit: config.stripLeadingNonDigit,
    anonymousColumn: config.anonymousColumn,
  })
  const { blank, duplicate } = prepared.dropped
  log.debug(`${path.basename(file)}: ${prepared.table.rows.length} respondents, dropped ${blank} without id, ${duplicate} duplicate`)
  return prepared.table
}

export interface LoadedWave {
  report: WaveReport
  before: SurveyTable
  after: SurveyTable | null
}

/** Read and prepare both surveys of a pair. Returns a skipped report when outputs already exist. */
export async function loadWavePair(
  pair: SurveyPair,
  sequenceNr: number,
  config: RunConfig,
  scoring: ScoringTable
): Promise<LoadedWave | WaveReport> {
  const dataName = determineSurveyDataName(path.basename(pair.pre), sequenceNr)
  const report: WaveReport = { dataName, pair, status: 'cleaned', outputs: [], notes: [] }
  const names = outputNames(config.folder, dataName)
  const targets = config.cleanOnly ? [names.cleaned] : [names.cleaned, names.analysis]
  const existing: string[] = []
  for (const file of targets) if (await fileExists(file)) existing.push(path.basename(file))
  if (existing.length && !config.overwrite) {
    log.warn(`Skipping ${dataName}: ${existing.join(', ')} already exists (use --overwrite to replace).`)
    return { ...report, status: 'skipped' }
  }

  const before = await loadWave(pair.pre, config, scoring)
  const after = pair.post ? await loadWave(pair.post, config, scoring) : null
  return { report, before, after }
}

/** Write the cleaned workbook and, when a post survey exists, the analysis workbook. */
export async function writeWaveResults(loaded: LoadedWave, config: RunConfig, scoring: ScoringTable): Promise<WaveReport> {
  const { before, after } = loaded
  const report: WaveReport = { ...loaded.report, outputs: [], notes: [] }
  const { dataName, pair } = report
  const names = outputNames(config.folder, dataName)
  await removePreviousResults(config.cleanOnly ? [names.cleaned] : [names.cleaned, names.analysis], config.overwrite)

  log.info(`Processing ${path.basename(pair.pre)}${pair.post ? ` and ${path.basename(pair.post)}` : ''}`)
  const cleanSheets: NamedTable[] = [{ name: CLEAN_SHEET_PRE_SURVEY, table: cleanedView(before, config) }]
  if (after) {
    cleanSheets.push({ name: CLEAN_SHEET_POST_SURVEY, table: cleanedView(after, config) })
    const split = splitRespondents(before, after, config.anonymousColumn)
    cleanSheets.push({ name: RESPONDENT_SHEET, table: respondentStatusTable(split, config.anonymousColumn) })
  }
  await writeWorkbook(names.cleaned, cleanSheets)
  report.outputs.push(names.cleaned)

  if (config.cleanOnly || !after) return report

  try {
    const result = pairedTTest(before, after, { idField: config.anonymousColumn, scoring })
    const validation = validatePairedResult(result)
    for (const issue of validation.issues) log.warn(`${dataName}: ${issue}`)
    report.notes.push(...validation.issues)
    const findings = buildFindingsReport(result, config.alpha)
    log.info(
      `${dataName}: ${result.respondents.common.length} paired respondents, ${result.questions.length} questions, ${findings.significantCount} significant at alpha = ${config.alpha}`
    )
    for (const f of findings.findings.filter((x) => x.significant)) log.info(`  ${f.headline}`)
    await writeWorkbook(names.analysis, analysisTables(result, findings))
    report.outputs.push(names.analysis)
    return { ...report, status: 'analyzed' }
  } catch (err) {
    if (!(err instanceof PartialDataError)) throw err
    log.warn(`${dataName}: t-test skipped. ${err.message}`)
    report.notes.push(err.message)
    return report
  }
}

function failed(pair: SurveyPair, sequenceNr: number, err: unknown): WaveReport {
  const dataName = determineSurveyDataName(path.basename(pair.pre), sequenceNr)
  log.error(`${dataName}: ${errorMessage(err)}`)
  return { dataName, pair, status: 'failed', outputs: [], notes: [], error: errorMessage(err) }
}

/**
 * Run every wave pair in the folder. All pairs are read first, so a ConfigurationError
 * (e.g. a missing identifier column) aborts before anything is written; any other
 * failure only affects its own pair. A pair whose output name was already taken by
 * an earlier pair is skipped.
 */
export async function runWaves(config: RunConfig, scoring: ScoringTable): Promise<WaveReport[]> {
  const pairs = await findSurveyFiles(config.folder, { allowMissingPost: config.cleanOnly })
  if (!pairs.length) {
    log.warn(`No survey files found in ${config.folder}`)
    return []
  }

  const loaded: (LoadedWave | WaveReport)[] = []
  const claimed = new Set<string>()
  for (const [i, pair] of pairs.entries()) {
    const dataName = determineSurveyDataName(path.basename(pair.pre), i + 1)
    if (claimed.has(dataName)) {
      const note = `Output name ${dataName} is already used by another survey in this run.`
      log.warn(`Skipping ${path.basename(pair.pre)}: ${note}`)
      loaded.push({ dataName, pair, status: 'skipped', outputs: [], notes: [note] })
      continue
    }
    claimed.add(dataName)
    try {
      loaded.push(await loadWavePair(pair, i + 1, config, scoring))
    } catch (err) {
      if (err instanceof ConfigurationError) throw err
      loaded.push(failed(pair, i + 1, err))
    }
  }

  const reports: WaveReport[] = []
  for (const [i, item] of loaded.entries()) {
    if (!('before' in item)) {
      reports.push(item)
      continue
    }
    try {
      reports.push(await writeWaveResults(item, config, scoring))
    } catch (err) {
      reports.push(failed(item.report.pair, i + 1, err))
    }
  }
  return reports
}

/** Validate the folder, load the scoring table once, then process all waves. */
export async function runSurveyFolder(config: RunConfig): Promise<WaveReport[]> {
  const stat = await fs.stat(config.folder).catch(() => null)
  if (!stat?.isDirectory()) throw new ConfigurationError(`Folder ${config.folder} does not exist.`)
  const scoring = await loadScoringTable(config.folder)
  log.debug(`Loaded scoring for ${scoring.questions.length} questions`)
  return runWaves(config, scoring)
}
