import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import type { LoggerOptions } from '../shared/logger.js'

const packageSchema = z.object({ version: z.string() })

const getVersion = (): string => {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  // src/cli/ when run from sources, dist/ when bundled
  for (const pkgPath of [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')]) {
    try {
      const parsed = packageSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')))
      if (parsed.success) return parsed.data.version
    } catch {
      continue
    }
  }
  return '0.0.0'
}

export type OutputFormat = 'json' | 'text'

export interface GlobalOptions {
  quiet: boolean
  verbose: boolean
  config?: string
}

export interface ReportOptions extends GlobalOptions {
  format: OutputFormat
  /** Use cached snapshots (remote, then local) before fetching live */
  local: boolean
  upload: boolean
  save: boolean
  top?: number
}

export interface DashboardOptions extends GlobalOptions {
  local: boolean
  top?: number
}

export type CommandAction =
  | { command: 'report'; options: ReportOptions }
  | { command: 'dashboard'; options: DashboardOptions }

const parseFormat = (value: string): OutputFormat => {
  if (value === 'json' || value === 'text') return value
  throw new InvalidArgumentError('Expected "json" or "text".')
}

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

const optionsSchema = z.object({
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
  config: z.string().optional(),
  local: z.boolean().default(false),
  top: z.number().int().positive().optional(),
})

const reportOptionsSchema = optionsSchema.extend({
  format: z.enum(['json', 'text']).default('text'),
  upload: z.boolean().default(true),
  save: z.boolean().default(true),
})

/**
 * Parse CLI arguments and return the command to execute.
 * Returns null if --help or --version was displayed.
 *
 * @example
 * parseArgs(['node', 'ledger-digest', 'report', '--local', '--format', 'json'])
 * // => { command: 'report', options: { format: 'json', local: true, upload: true, save: true, ... } }
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command) =>
    cmd
      .option('-q, --quiet', 'Only log warnings and errors')
      .option('-v, --verbose', 'Log debug output')
      .option('--config <path>', 'Path to config file')
      .option('-l, --local', 'Use cached snapshots before fetching from Splitwise')
      .option('-t, --top <n>', 'Number of top categories to show', parsePositiveInt)

  const program = addGlobalOptions(
    new Command()
      .name('ledger-digest')
      .description('Monthly spending statistics for shared Splitwise expenses')
      .version(getVersion())
      // Options after a subcommand belong to the subcommand
      .enablePositionalOptions()
  ).action((options: unknown) => {
    // Default action when no subcommand is provided: the dashboard
    result = { command: 'dashboard', options: optionsSchema.parse(options) }
  })

  // Throw instead of process.exit; subcommands inherit this when created
  program.exitOverride()

  // `ledger-digest --verbose report` leaves --verbose on the program
  const withProgramOptions = (command: Command): Record<string, unknown> => ({
    ...program.opts(),
    ...command.opts(),
  })

  addGlobalOptions(
    program
      .command('report')
      .description('Print the statistics report and save snapshots')
      .option('-f, --format <format>', 'Output format: json or text', parseFormat, 'text')
      .option('--no-upload', 'Do not upload the snapshot to Google Drive')
      .option('--no-save', 'Do not write snapshot and report files locally')
  ).action((_options: unknown, command: Command) => {
    result = { command: 'report', options: reportOptionsSchema.parse(withProgramOptions(command)) }
  })

  addGlobalOptions(
    program.command('dashboard').description('Show the interactive spending dashboard')
  ).action((_options: unknown, command: Command) => {
    result = { command: 'dashboard', options: optionsSchema.parse(withProgramOptions(command)) }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err instanceof CommanderError && (err.code === 'commander.helpDisplayed' || err.code === 'commander.version')) {
      return null
    }
    throw err
  }

  return result
}

/**
 * Logger settings for a command. The dashboard logs nothing unless verbose:
 * stderr output would tear through the Ink screen.
 */
export const loggerOptionsFor = ({ command, options }: CommandAction): LoggerOptions => ({
  quiet: options.quiet,
  verbose: options.verbose,
  silent: command === 'dashboard' && !options.verbose,
})
