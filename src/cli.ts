#!/usr/bin/env node
import os from 'os'
import path from 'path'
import { parseArgs } from 'util'
import { EngineConfigInput, mergeConfig } from './main/config'
import { DecisionEngine } from './main/decision-engine'
import { walkDirectories } from './main/directory-walker'
import { ensureError, isConfigError, isSweepwiseError } from './main/errors'
import { logger, setLogLevel } from './main/logger'
import { formatSummary, summarizePlan, writePlanReport } from './main/report-writer'
import { SettingsStore } from './main/settings-store'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2

const HELP = `Usage:
  sweepwise scan [options]        Recommend keep / archive / delete for files
  sweepwise init-config [options] Write a settings file with every default

Options:
  -r, --root <dir>            Directory to scan (repeatable, default ~/Downloads)
  -o, --output-dir <dir>      Where the CSV report goes (default ./cleanup_reports)
  -c, --config <file>         Settings file (default ./sweepwise.config.json)
      --stale-threshold <d>   Days since modification to count as stale
      --max-files <n>         Stop after n files
      --time-budget-ms <n>    Stop deciding after n milliseconds
      --concurrency <n>       Files fingerprinted at once
      --json                  Print the full plan as JSON
  -v, --verbose               Debug logs on stderr
  -h, --help                  Show this help

No file is ever moved or deleted; the output is a report.`

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export interface ScanArgs {
  command: 'scan' | 'init-config' | 'help'
  roots: string[]
  outputDir: string
  configPath?: string
  json: boolean
  verbose: boolean
  overrides: EngineConfigInput
}

function toNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new CliUsageError(`--${flag} expects a number, got "${raw}"`)
  }
  return value
}

function toInteger(flag: string, raw: string | undefined): number | undefined {
  const value = toNumber(flag, raw)
  if (value !== undefined && !Number.isInteger(value)) {
    throw new CliUsageError(`--${flag} expects an integer, got "${raw}"`)
  }
  return value
}

function readArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        root: { type: 'string', short: 'r', multiple: true },
        'output-dir': { type: 'string', short: 'o' },
        config: { type: 'string', short: 'c' },
        'stale-threshold': { type: 'string' },
        'max-files': { type: 'string' },
        'time-budget-ms': { type: 'string' },
        concurrency: { type: 'string' },
        json: { type: 'boolean', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      },
      allowPositionals: true,
      strict: true
    })
  } catch (err: unknown) {
    throw new CliUsageError(ensureError(err).message)
  }
}

export function parseScanArgs(argv: readonly string[]): ScanArgs {
  const { values, positionals } = readArgv(argv)
  const command = positionals[0] ?? 'help'
  if (positionals.length > 1) {
    throw new CliUsageError(`unexpected argument: ${positionals[1]}`)
  }
  if (command !== 'scan' && command !== 'init-config' && command !== 'help') {
    throw new CliUsageError(`unknown command: ${command}`)
  }

  const overrides: EngineConfigInput = {}
  const stale = toNumber('stale-threshold', values['stale-threshold'])
  if (stale !== undefined) overrides.staleThresholdDays = stale
  const maxFiles = toInteger('max-files', values['max-files'])
  if (maxFiles !== undefined) overrides.maxFiles = maxFiles
  const budget = toInteger('time-budget-ms', values['time-budget-ms'])
  if (budget !== undefined) overrides.timeBudgetMs = budget
  const concurrency = toInteger('concurrency', values.concurrency)
  if (concurrency !== undefined) overrides.concurrency = concurrency

  return {
    command: values.help ? 'help' : command,
    roots: values.root ?? [path.join(os.homedir(), 'Downloads')],
    outputDir: values['output-dir'] ?? path.resolve('cleanup_reports'),
    configPath: values.config,
    json: values.json ?? false,
    verbose: values.verbose ?? false,
    overrides
  }
}

export function formatProgress(label: string, done: number, total: number, width = 36): string {
  const ratio = total > 0 ? Math.min(1, done / total) : 1
  const filled = Math.round(ratio * width)
  const bar = `${'#'.repeat(filled)}${'-'.repeat(width - filled)}`
  return `${label}: [${bar}] ${(ratio * 100).toFixed(1).padStart(5)}% (${done}/${total})`
}

/**
 * Redraws one status line in place, only when the whole percent changes,
 * and ends it with a newline once the phase completes.
 */
export function progressReporter(
  stream: { write(text: string): unknown },
  label = 'Fingerprinting'
): (done: number, total: number) => void {
  let lastPercent = -1
  return (done, total) => {
    const percent = total > 0 ? Math.floor((done / total) * 100) : 100
    const finished = done >= total
    if (percent === lastPercent && !finished) return
    lastPercent = percent
    stream.write(`\r${formatProgress(label, done, total)}`)
    if (finished) stream.write('\n')
  }
}

async function runScan(args: ScanArgs): Promise<number> {
  const store = new SettingsStore(args.configPath)
  const config = mergeConfig(await store.load(), args.overrides)

  const walk = await walkDirectories(args.roots, {
    exclusions: config.excludePaths,
    maxFiles: config.maxFiles
  })
  const engine = new DecisionEngine(config)
  const showProgress = (process.stderr.isTTY ?? false) && !args.json
  const report = showProgress ? progressReporter(process.stderr) : undefined
  const plan = await engine.evaluate(walk.entries, {
    warnings: walk.warnings,
    onProgress: report ? (_phase, done, total) => report(done, total) : undefined
  })
  if (walk.truncated) plan.truncated = true

  const paths = await writePlanReport(plan, args.outputDir)

  if (args.json) {
    console.log(JSON.stringify(plan, null, 2))
  } else {
    console.log(`Scanned ${plan.stats.filesConsidered} files in ${args.roots.join(', ')}`)
    console.log(formatSummary(summarizePlan(plan)))
    console.log(`Report: ${paths.plan}`)
    console.log(`Comparison: ${paths.comparison}`)
    console.log('No files were modified or deleted.')
  }
  return EXIT_SUCCESS
}

async function runInitConfig(args: ScanArgs): Promise<number> {
  const store = new SettingsStore(args.configPath)
  const config = mergeConfig(await store.load(), args.overrides)
  await store.save(config)
  console.log(`Settings written to ${store.filePath}`)
  return EXIT_SUCCESS
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let args: ScanArgs
  try {
    args = parseScanArgs(argv)
  } catch (err: unknown) {
    console.error(`sweepwise: ${ensureError(err).message}`)
    console.error(HELP)
    return EXIT_USAGE
  }

  if (args.verbose) setLogLevel('DEBUG')

  try {
    if (args.command === 'scan') return await runScan(args)
    if (args.command === 'init-config') return await runInitConfig(args)
    console.log(HELP)
    return EXIT_SUCCESS
  } catch (err: unknown) {
    const error = ensureError(err)
    if (isConfigError(error)) {
      console.error(`sweepwise: ${error.message}`)
      return EXIT_USAGE
    }
    logger.error('Run failed', { error })
    console.error(`sweepwise: ${isSweepwiseError(error) ? error.toDetailedString() : error.message}`)
    return EXIT_ERROR
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code
    })
    .catch((err: unknown) => {
      console.error(err)
      process.exitCode = EXIT_ERROR
    })
}
