/**
 * Survey file discovery and output naming.
 * A wave pair is 'Pre<stem>' and 'Post<stem>' with the same extension in one folder.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import { ANALYSIS_OUTPUT_BASE, CLEANED_OUTPUT_BASE, DATA_OUTPUT_BASENAME } from './config'
import { TABLE_EXTENSIONS } from './tableIO'

const PRE_PREFIX = 'Pre'
const POST_PREFIX = 'Post'

export interface SurveyPair {
  pre: string
  /** null when only the pre survey exists (clean-only runs) */
  post: string | null
}

export interface OutputNames {
  analysis: string
  cleaned: string
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file)
    return true
  } catch {
    return false
  }
}

function isSurveyFile(name: string): boolean {
  const ext = path.extname(name).toLowerCase()
  return TABLE_EXTENSIONS.some((e) => e === ext)
}

/** Post-survey file name belonging to a pre-survey file name. */
export function postNameFor(preName: string): string {
  return POST_PREFIX + preName.slice(PRE_PREFIX.length)
}

export async function findSurveyFiles(
  folder: string,
  options: { allowMissingPost?: boolean } = {}
): Promise<SurveyPair[]> {
  const names = (await fs.readdir(folder)).filter((n) => n.startsWith(PRE_PREFIX) && isSurveyFile(n)).sort()
  const pairs: SurveyPair[] = []
  for (const name of names) {
    const post = path.join(folder, postNameFor(name))
    if (await exists(post)) pairs.push({ pre: path.join(folder, name), post })
    else if (options.allowMissingPost) pairs.push({ pre: path.join(folder, name), post: null })
  }
  return pairs
}

/**
 * Stable name for a wave's outputs: 'data_survey_(1-89)' when the file name has a
 * '(n-m)' response range, else 'data_survey_07' from the sequence number.
 */
export function determineSurveyDataName(fileName: string, sequenceNr: number): string {
  const range = /\(\d+-\d+\)/.exec(path.basename(fileName))
  if (range) return `${DATA_OUTPUT_BASENAME}_${range[0]}`
  return `${DATA_OUTPUT_BASENAME}_${String(sequenceNr).padStart(2, '0')}`
}

export function outputNames(folder: string, dataName: string): OutputNames {
  return {
    analysis: path.join(folder, `${ANALYSIS_OUTPUT_BASE}_${dataName}.xlsx`),
    cleaned: path.join(folder, `${CLEANED_OUTPUT_BASE}_${dataName}.xlsx`),
  }
}

/** Delete existing result files, but only when overwriting was asked for. Returns the removed files. */
export async function removePreviousResults(files: string[], overwrite: boolean): Promise<string[]> {
  if (!overwrite) return []
  const removed: string[] = []
  for (const file of files) {
    if (!(await exists(file))) continue
    await fs.rm(file)
    removed.push(file)
  }
  return removed
}

export { exists as fileExists }
