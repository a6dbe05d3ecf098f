/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 * Options that may also come from the config file stay `undefined` when not
 * given on the command line; `resolveSettings` fills them in.
 */

import { Command } from 'commander'
import { ConfigError } from '../errors'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type CommandName = 'normalize' | 'segment' | 'process' | 'summarize' | 'validate' | 'config'

export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: CommandName | 'help'
  input: string
  /** Output file for single-output commands */
  output: string | undefined
  /** Output directory for the process command */
  outputDir: string | undefined
  schemaVersion: string | undefined
  sourceDeviceId: string | undefined
  windowHours: number | undefined
  maxSegments: number | undefined
  model: string | undefined
  quiet: boolean
  verbose: boolean
  noCache: boolean
  cacheDir: string | undefined
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const COMMAND_NAMES: readonly CommandName[] = [
  'normalize',
  'segment',
  'process',
  'summarize',
  'validate',
  'config'
]

const DESCRIPTION = `Normalize exported chat messages, extract features, and group them into
conversation segments.

Input is a file of raw message objects (JSONL or concatenated JSON).

Examples:
  $ chat-segments process messages.json
  $ chat-segments normalize messages.json -o out/normalized.jsonl
  $ chat-segments segment out/normalized.jsonl --window-hours 1
  $ chat-segments summarize out/messages_segmented.jsonl -n 5
  $ chat-segments validate out/normalized.jsonl`

function createProgram(): Command {
  const program = new Command()
    .name('chat-segments')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--no-cache', 'Skip cache and regenerate all summaries')
    .option('--cache-dir <dir>', 'Custom cache directory (or set CHAT_SEGMENTS_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set CHAT_SEGMENTS_CONFIG)')

  // ============ PROCESS (normalize + segment) ============
  program
    .command('process')
    .description('Normalize raw messages and segment them (writes *_normalized and *_segmented)')
    .argument('<input>', 'Raw message export (JSONL or concatenated JSON)')
    .option('--output-dir <dir>', 'Output directory (default: next to the input)')
    .option('--window-hours <num>', 'Max gap inside one segment, in hours')
    .option('--schema-version <version>', 'schema_version for normalized records')
    .option('--device-id <id>', 'source_device_id for normalized records')

  // ============ NORMALIZE ============
  program
    .command('normalize')
    .description('Normalize raw messages into JSONL records with features and fingerprints')
    .argument('<input>', 'Raw message export (JSONL or concatenated JSON)')
    .option('-o, --output <file>', 'Output file (default: <input>_normalized.jsonl)')
    .option('--schema-version <version>', 'schema_version for normalized records')
    .option('--device-id <id>', 'source_device_id for normalized records')

  // ============ SEGMENT ============
  program
    .command('segment')
    .description('Group normalized records into conversation segments')
    .argument('<input>', 'Normalized JSONL file')
    .option('-o, --output <file>', 'Output file (default: <input>_segmented.jsonl)')
    .option('--window-hours <num>', 'Max gap inside one segment, in hours')

  // ============ SUMMARIZE ============
  program
    .command('summarize')
    .description('Summarize segments (uses OPENAI_API_KEY when set, templates otherwise)')
    .argument('<input>', 'Segmented JSONL file')
    .option('-n, --max-segments <num>', 'Segments to summarize, 0 for all')
    .option('--model <model>', 'Model used for summaries')
    .option('-o, --output <file>', 'Output file (default: <input>_summaries.jsonl)')

  // ============ VALIDATE ============
  program
    .command('validate')
    .description('Check normalized JSONL for schema compliance')
    .argument('<input>', 'Normalized JSONL file')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  chat-segments config                        List current settings
  chat-segments config set windowHours 1.5    Set the segment window
  chat-segments config unset cacheDir         Remove custom cache dir`
    )

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalNumber(name: string, value: unknown): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (typeof value !== 'string' || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigError(`--${name} must be a number, got "${String(value)}"`)
  }
  return parsed
}

function buildCLIArgs(
  command: CommandName | 'help',
  input: string,
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command,
    input,
    output: optionalString(opts.output),
    outputDir: optionalString(opts.outputDir),
    schemaVersion: optionalString(opts.schemaVersion),
    sourceDeviceId: optionalString(opts.deviceId),
    windowHours: optionalNumber('window-hours', opts.windowHours),
    maxSegments: optionalNumber('max-segments', opts.maxSegments),
    model: optionalString(opts.model),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    noCache: opts.cache === false,
    cacheDir: optionalString(opts.cacheDir),
    configFile: optionalString(opts.configFile),
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

function toCommandName(name: string): CommandName | 'help' {
  return COMMAND_NAMES.find((command) => command === name) ?? 'help'
}

/**
 * Attach action handlers that capture the parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command): () => CLIArgs | null {
  let result: CLIArgs | null = null

  for (const cmd of program.commands) {
    if (cmd.name() === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        result = {
          ...buildCLIArgs('config', '', cmd.optsWithGlobals()),
          configAction: parseConfigAction(action),
          configKey: key,
          configValue: value
        }
      })
    } else {
      cmd.action((input: string) => {
        result = buildCLIArgs(toCommandName(cmd.name()), input, cmd.optsWithGlobals())
      })
    }
  }

  return () => result
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()
  const getResult = captureArgs(program)

  program.parse()

  const result = getResult()
  if (!result) {
    program.help()
  }
  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 * Returns a `help` command instead of exiting.
 */
export function parseArgs(argv: string[]): CLIArgs {
  const program = createProgram()
  for (const command of [program, ...program.commands]) {
    command.exitOverride()
    command.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }
  const getResult = captureArgs(program)

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version and usage errors
    if (error instanceof ConfigError) throw error
  }

  return getResult() ?? buildCLIArgs('help', '', {})
}
