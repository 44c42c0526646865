import { resolveConfig, type RunOptions } from './lib/config'
import { errorMessage } from './lib/errors'
import * as log from './lib/logger'
import { runSurveyFolder, type WaveReport } from './lib/waveRunner'

export const USAGE = [
  'Usage: survey-pair <folder> [options]',
  '',
  'Anonymizes Pre*/Post* survey files in <folder>, converts answers to ranks',
  'using Scoring.xlsx (or Scoring.csv) and runs paired t-tests per question',
  'and per respondent.',
  '',
  'Options:',
  '  -c, --column <name>   identifier column (default "Your student number")',
  '  -l, --level <level>   raw | both | anonymous (default anonymous)',
  '  -s, --strip           strip a leading non-digit from identifiers',
  '      --clean-only      only write cleaned surveys; post survey optional',
  '  -o, --overwrite       replace existing outputs',
  '  -a, --alpha <p>       significance level for the summary (default 0.05)',
  '  -h, --help            show this help',
].join('\n')

export type ParsedArgs = { help: true } | { help: false; options: RunOptions }

function takeValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1]
  if (value === undefined || value.startsWith('-')) throw new Error(`Missing value for ${flag}`)
  return value
}

export function parseArgs(argv: string[]): ParsedArgs {
  let folder: string | undefined
  const options: Omit<RunOptions, 'folder'> = {}
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    switch (arg) {
      case '-h':
      case '--help':
        return { help: true }
      case '-c':
      case '--column':
        options.idColumn = takeValue(argv, i++, arg)
        break
      case '-l':
      case '--level':
        options.level = takeValue(argv, i++, arg)
        break
      case '-s':
      case '--strip':
        options.stripLeadingNonDigit = true
        break
      case '--clean-only':
        options.cleanOnly = true
        break
      case '-o':
      case '--overwrite':
        options.overwrite = true
        break
      case '-a':
      case '--alpha': {
        const raw = takeValue(argv, i++, arg)
        const alpha = Number(raw)
        if (Number.isNaN(alpha)) throw new Error(`Invalid value for ${arg}: ${raw}`)
        options.alpha = alpha
        break
      }
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option ${arg}`)
        if (folder !== undefined) throw new Error(`Unexpected argument ${arg}`)
        folder = arg
    }
  }
  if (folder === undefined) throw new Error('No survey folder given')
  return { help: false, options: { ...options, folder } }
}

function summarize(reports: WaveReport[]): string {
  const count = (status: WaveReport['status']) => reports.filter((r) => r.status === status).length
  return `${reports.length} wave pair(s): ${count('analyzed')} analyzed, ${count('cleaned')} cleaned only, ${count('skipped')} skipped, ${count('failed')} failed`
}

/** Returns the process exit code. */
export async function main(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv)
    if (parsed.help) {
      console.log(USAGE)
      return 0
    }
    const config = resolveConfig(parsed.options)
    const reports = await runSurveyFolder(config)
    if (reports.length) log.info(summarize(reports))
    return reports.some((r) => r.status === 'failed') ? 1 : 0
  } catch (err) {
    console.error('Error:', errorMessage(err))
    return 1
  }
}
