#!/usr/bin/env node

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import * as readline from 'readline/promises'
import path from 'path'
import packageJson from '../../package.json'
import { ConfigLoader } from '../config/ConfigLoader'
import { DecodiffError, Notify, OutputRequest, ReportArtifact } from '../contracts'
import { ReportManager } from '../decodiff/ReportManager'
import { FormatterFactory } from '../formatting/FormatterFactory'
import { SnapshotLoader } from '../snapshot/SnapshotLoader'
import { CommandRegistry, CreatedReports, FileOpener, OpenPrompt, SystemFileOpener, commands } from '../commands'
import { Ask } from '../commands/OpenPrompt'
import { debugLog, describeError } from '../debug/debugLog'

export interface CliOptions {
  oldExport: string
  newExport: string
  excel?: string
  text?: string
  both: boolean
  config?: string
  open: boolean
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'compare'; options: CliOptions }

export interface CliDependencies {
  cwd: string
  out: Notify
  err: Notify
  opener: FileOpener
  /** Only set when the user can answer questions */
  ask?: Ask
}

export class CliUsageError extends DecodiffError {}

const DESCRIPTION = [
  'Usage: $0 [options] <old_export> <new_export>',
  '',
  'Compares two export files (JSON or TXT) used for tracking changes in decorations in Monster Hunter World.',
  'This tool allows tracking changes in decorations and formats the output for Excel or as text.',
].join('\n')

// A repeated option arrives as an array; the last one wins
const lastValue = (value: string | string[]): string =>
  Array.isArray(value) ? value[value.length - 1] : value

export function buildParser(args: string[]) {
  return yargs(args)
    .scriptName('decodiff')
    .usage(DESCRIPTION)
    .option('excel', {
      alias: 'e',
      type: 'string',
      coerce: lastValue,
      describe: "Path and filename for Excel output. Defaults to 'DecoChanges.xlsx' in the current directory",
    })
    .option('text', {
      alias: 't',
      type: 'string',
      coerce: lastValue,
      describe: "Path and filename for Text output. Defaults to 'DecoChanges.txt' in the current directory",
    })
    .option('both', {
      alias: 'b',
      type: 'boolean',
      default: false,
      describe: 'Create both Excel and Text versions',
    })
    .option('config', {
      alias: 'c',
      type: 'string',
      coerce: lastValue,
      describe: 'Path to a decodiff config file',
    })
    .option('open', {
      type: 'boolean',
      default: true,
      describe: 'Offer to open the created files (--no-open to skip)',
    })
    .option('help', {
      alias: 'h',
      type: 'boolean',
      describe: 'Show this help message',
    })
    .demandCommand(2, 2, 'Two export files are required: <old_export> <new_export>', 'Only two export files can be compared')
    .epilog('By default, outputs are displayed in the terminal.')
    .strict()
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw new CliUsageError(message || error?.message || 'Invalid arguments')
    })
}

export async function parseArgs(args: string[]): Promise<ParsedArgs> {
  // Checked before parsing so a bare -h never fails on missing exports
  if (args.includes('-h') || args.includes('--help')) {
    return { kind: 'help' }
  }
  if (args.includes('--version')) {
    return { kind: 'version' }
  }

  const argv = await buildParser(args).parseAsync()
  const [oldExport, newExport] = argv._.map(String)

  return {
    kind: 'compare',
    options: {
      oldExport,
      newExport,
      excel: argv.excel,
      text: argv.text,
      both: argv.both,
      config: argv.config,
      open: argv.open,
    },
  }
}

export function printHelp(out: Notify): void {
  buildParser([]).showHelp(text => out(text))
}

/**
 * Which outputs to produce. A flag given without a path uses the default name.
 */
export function outputRequests(options: CliOptions): OutputRequest[] {
  const requests: OutputRequest[] = []
  if (options.excel !== undefined || options.both) {
    requests.push({ kind: 'spreadsheet', path: options.excel || undefined })
  }
  if (options.text !== undefined || options.both) {
    requests.push({ kind: 'text', path: options.text || undefined })
  }
  return requests.length > 0 ? requests : [{ kind: 'terminal' }]
}

export function createdReports(artifacts: ReportArtifact[]): CreatedReports {
  const reports: CreatedReports = {}
  for (const artifact of artifacts) {
    if (!artifact.created || artifact.path === null) continue
    if (artifact.kind === 'spreadsheet') reports.spreadsheet = artifact.path
    if (artifact.kind === 'text') reports.text = artifact.path
  }
  return reports
}

export async function run(args: string[], deps: CliDependencies): Promise<number> {
  let parsed: ParsedArgs
  try {
    parsed = await parseArgs(args)
  } catch (error) {
    if (error instanceof CliUsageError) {
      deps.err(error.message)
      printHelp(deps.out)
      return 1
    }
    throw error
  }

  if (parsed.kind === 'help') {
    printHelp(deps.out)
    return 0
  }
  if (parsed.kind === 'version') {
    deps.out(`decodiff v${packageJson.version}`)
    return 0
  }

  const { options } = parsed
  try {
    const config = new ConfigLoader(options.config, deps.cwd).getConfig()
    const formatterFactory = new FormatterFactory(config, { cwd: deps.cwd, notify: deps.out })
    const manager = new ReportManager(new SnapshotLoader(config.input), formatterFactory, deps.out)

    const summary = await manager.run(
      path.resolve(deps.cwd, options.oldExport),
      path.resolve(deps.cwd, options.newExport),
      outputRequests(options)
    )
    if (summary.status === 'identical') {
      return 0
    }

    const reports = createdReports(summary.artifacts)
    const anyCreated = reports.spreadsheet !== undefined || reports.text !== undefined
    if (anyCreated && options.open && config.prompt.openCreatedFiles && deps.ask) {
      const prompt = new OpenPrompt(CommandRegistry.createWithDefaults(commands), deps.ask)
      await prompt.run({ opener: deps.opener, reports, notify: deps.out })
    }
    return 0
  } catch (error) {
    debugLog({
      event: 'run_failed',
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    })
    deps.err(`An unexpected error occurred: \n${describeError(error)}`)
    return 1
  }
}

const askOnTerminal: Ask = async (question) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  try {
    return (await rl.question(question)).toLowerCase()
  } finally {
    rl.close()
  }
}

// Only run if this is the main module
if (require.main === module) {
  run(hideBin(process.argv), {
    cwd: process.cwd(),
    out: message => console.log(message),
    err: message => console.error(message),
    opener: new SystemFileOpener(),
    ask: process.stdin.isTTY ? askOnTerminal : undefined,
  })
    .then(code => process.exit(code))
    .catch(error => {
      console.error('decodiff failed:', error)
      process.exit(1)
    })
}
