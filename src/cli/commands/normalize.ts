/**
 * Normalize Command
 *
 * Raw export → normalized JSONL.
 */

import { toJsonl } from '../../parser/index'
import type { CLIArgs } from '../args'
import { outputPathFor, readInputFile, writeOutputFile } from '../io'
import type { Logger } from '../logger'
import { logErrorTally, runNormalizeStage } from '../pipeline'
import type { Settings } from '../settings'

export async function cmdNormalize(args: CLIArgs, settings: Settings, logger: Logger): Promise<void> {
  const content = await readInputFile(args.input)
  const { records, skipped } = runNormalizeStage(content, settings, logger)

  const outputPath = args.output ?? outputPathFor(args.input, 'normalized', settings.outputDir)
  await writeOutputFile(outputPath, toJsonl(records))
  logger.success(`Saved normalized records to ${outputPath}`)

  logErrorTally(skipped, logger)
}
