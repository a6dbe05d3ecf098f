/**
 * Process Command
 *
 * Raw export → normalized JSONL and segmented JSONL in one run.
 */

import { VERSION } from '../../index'
import { toJsonl } from '../../parser/index'
import type { CLIArgs } from '../args'
import { outputPathFor, readInputFile, writeOutputFile } from '../io'
import type { Logger } from '../logger'
import { logErrorTally, runNormalizeStage, runSegmentStage } from '../pipeline'
import type { Settings } from '../settings'

export async function cmdProcess(args: CLIArgs, settings: Settings, logger: Logger): Promise<void> {
  logger.log(`\nchat-segments v${VERSION}`)

  // Read before writing anything so a bad input path leaves no partial output
  const content = await readInputFile(args.input)

  logger.log('\n📥 Normalizing...')
  const { records, skipped } = runNormalizeStage(content, settings, logger)

  logger.log('\n🧩 Segmenting...')
  const segments = runSegmentStage(records, settings, logger)

  const normalizedPath = outputPathFor(args.input, 'normalized', settings.outputDir)
  const segmentedPath = outputPathFor(args.input, 'segmented', settings.outputDir)
  await writeOutputFile(normalizedPath, toJsonl(records))
  await writeOutputFile(segmentedPath, toJsonl(segments))

  logger.log('')
  logger.success(`Normalized: ${normalizedPath}`)
  logger.success(`Segmented: ${segmentedPath}`)
  logErrorTally(skipped, logger)
}
