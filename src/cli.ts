#!/usr/bin/env node
/**
 * chat-segments CLI
 *
 * Local orchestrator for the core library.
 * Handles file I/O, configuration, progress reporting, and error tallies.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdNormalize } from './cli/commands/normalize'
import { cmdProcess } from './cli/commands/process'
import { cmdSegment } from './cli/commands/segment'
import { cmdSummarize } from './cli/commands/summarize'
import { cmdValidate } from './cli/commands/validate'
import { loadConfig } from './cli/config'
import { createLogger } from './cli/logger'
import { resolveSettings } from './cli/settings'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    if (args.command === 'config') {
      await cmdConfig(args, logger)
      return
    }

    const settings = resolveSettings(args, await loadConfig(args.configFile))

    switch (args.command) {
      case 'normalize':
        await cmdNormalize(args, settings, logger)
        break

      case 'segment':
        await cmdSegment(args, settings, logger)
        break

      case 'process':
        await cmdProcess(args, settings, logger)
        break

      case 'summarize':
        await cmdSummarize(args, settings, logger)
        break

      case 'validate':
        await cmdValidate(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'chat-segments --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  // Argument errors surface before the logger exists
  console.error(`  ✗ ${error instanceof Error ? error.message : String(error)}`)
  process.exit(1)
})
